import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import type { Logger } from "pino";
import { z } from "zod";
import { type ServerConfig, loadConfig } from "./config.js";
import { deriveSchema } from "./deriveSchema.js";
import { SurveyError } from "./errors.js";
import { toJsonSchema } from "./jsonSchema.js";
import { childLogger, logger as rootLogger } from "./logger.js";
import {
  InMemorySessionStore,
  describeQuestion,
  getCurrentQuestionPath,
  moveToNextQuestion,
  moveToPreviousQuestion,
  runValidation,
  setAnswer,
  submitSession,
} from "./sessionEngine.js";
import type { JsonSchema, SurveySession } from "./sessionTypes.js";
import type { Question } from "./surveyTypes.js";

export type SurveyServerOptions = {
  store: InMemorySessionStore;
  config?: ServerConfig;
  logger?: Logger;
};

type SessionSummary = {
  sessionId: string;
  surveyId: string;
  userId: string | null;
  status: string;
  overallValidity: string;
  currentQuestionPath: string | null;
  currentQuestion: QuestionSummary | null;
  remainingQuestions: number;
};

type QuestionSummary = {
  path: string;
  prompt: string;
  kind: string;
  optional: boolean;
  options?: string[];
  element?: string;
  min?: number;
  max?: number;
  suggested?: unknown;
};

function summarizeQuestion(path: string, question: Question): QuestionSummary {
  const kind = question.kind;
  const summary: QuestionSummary = { path, prompt: question.prompt, kind: kind.type, optional: question.optional };
  switch (kind.type) {
    case "oneOf":
      summary.options = kind.variants.map((variant) => variant.prompt);
      break;
    case "anyOf":
      summary.options = kind.options.map((option) => option.prompt);
      break;
    case "list":
      summary.element = kind.element;
      if (kind.min !== undefined) summary.min = kind.min;
      if (kind.max !== undefined) summary.max = kind.max;
      break;
    case "int":
    case "float":
      if (kind.min !== undefined) summary.min = kind.min;
      if (kind.max !== undefined) summary.max = kind.max;
      break;
  }
  if (question.default.type === "suggested") summary.suggested = question.default.value.value;
  return summary;
}

function summarizeSession(session: SurveySession): SessionSummary {
  const currentQuestionPath = getCurrentQuestionPath(session);
  const question = currentQuestionPath === null ? undefined : describeQuestion(session, currentQuestionPath);
  return {
    sessionId: session.sessionId,
    surveyId: session.surveyId,
    userId: session.userId ?? null,
    status: session.status,
    overallValidity: session.overallValidity,
    currentQuestionPath,
    currentQuestion: currentQuestionPath !== null && question ? summarizeQuestion(currentQuestionPath, question) : null,
    remainingQuestions: Math.max(0, session.questionOrder.length - session.currentQuestionIndex - 1),
  };
}

type RegisteredTool = {
  name: string;
  description: string;
  inputSchema: JsonSchema;
};

type ToolHandler = (args: Record<string, unknown>) => Promise<unknown>;

const sessionIdInput = {
  type: "object",
  properties: {
    sessionId: { type: "string" },
  },
  required: ["sessionId"],
};

/** Build the survey MCP server over `store`. Not connected to a transport yet. */
export function createServer(options: SurveyServerOptions): Server {
  const { store } = options;
  const config = options.config ?? loadConfig();
  const log = options.logger ?? childLogger(rootLogger, { component: "mcp-server" });

  const server = new Server(
    {
      name: config.serverName,
      version: config.serverVersion,
    },
    {
      capabilities: {
        tools: {},
      },
    },
  );

  const registeredTools: RegisteredTool[] = [];
  const toolHandlers = new Map<string, ToolHandler>();

  // Registers a tool whose arguments are parsed with `inputSchema` before the handler runs
  function registerTool<In extends z.ZodTypeAny>(
    name: string,
    description: string,
    inputSchema: In,
    handler: (input: z.infer<In>) => Promise<unknown> | unknown,
    jsonSchemaStub: JsonSchema = { type: "object", properties: {} },
  ): void {
    registeredTools.push({ name, description, inputSchema: jsonSchemaStub });
    toolHandlers.set(name, async (args) => {
      const parsed = inputSchema.parse(args);
      return handler(parsed);
    });
  }

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const handler = toolHandlers.get(name);
    if (!handler) {
      throw new Error(`Tool not found: ${name}`);
    }
    log.debug({ tool: name }, "Tool called");
    try {
      const result = await handler(args ?? {});
      return {
        content: [
          {
            type: "text" as const,
            text: JSON.stringify(result, null, 2),
          },
        ],
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      const code = err instanceof SurveyError ? err.code : undefined;
      log.warn({ tool: name, code, err: message }, "Tool failed");
      return {
        content: [
          {
            type: "text" as const,
            text: `Error: ${message}`,
          },
        ],
        isError: true,
      };
    }
  });

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    const tools = registeredTools.map((t) => ({
      name: t.name,
      description: t.description,
      inputSchema: { ...t.inputSchema, type: "object" as const },
    }));
    return { tools };
  });

  // List available surveys
  registerTool(
    "list_surveys",
    "List all registered surveys with a JSON Schema of the answers each one collects.",
    z.object({}),
    () => {
      const surveys = store.listSurveys().map((s) => ({
        id: s.id,
        name: s.name,
        description: s.description ?? null,
        schema: toJsonSchema(deriveSchema(s.shape), { id: s.id }),
      }));
      return { surveys };
    },
  );

  registerTool(
    "start_survey_session",
    "Start a new session for a survey id, optionally associated with a user.",
    z.object({
      surveyId: z.string(),
      userId: z.string().optional(),
    }),
    ({ surveyId, userId }) => {
      const session = store.createSession(surveyId, userId);
      log.info({ sessionId: session.sessionId, surveyId }, "Survey session started");
      return {
        session: summarizeSession(session),
        prelude: session.schema.prelude ?? null,
        questionOrder: session.questionOrder,
      };
    },
    {
      type: "object",
      properties: {
        surveyId: { type: "string" },
        userId: { type: "string" },
      },
      required: ["surveyId"],
    },
  );

  registerTool(
    "list_user_sessions",
    "List all survey sessions associated with a specific user.",
    z.object({
      userId: z.string(),
    }),
    ({ userId }) => {
      const sessions = store.listSessions({ userId });
      return { sessions: sessions.map(summarizeSession) };
    },
    {
      type: "object",
      properties: {
        userId: { type: "string" },
      },
      required: ["userId"],
    },
  );

  registerTool(
    "get_survey_state",
    "Get full state for a survey session, including the answers so far and field-level validity.",
    z.object({
      sessionId: z.string(),
    }),
    ({ sessionId }) => {
      const session = store.requireSession(sessionId);
      return {
        session: summarizeSession(session),
        questionOrder: session.questionOrder,
        answers: session.responses.toRecord(),
        fields: session.fields,
      };
    },
    sessionIdInput,
  );

  // Answer one question
  registerTool(
    "set_answer",
    "Answer the question at a dotted path. Enum questions take a variant label or index; multi-selects take a list of them.",
    z.object({
      sessionId: z.string(),
      path: z.string(),
      value: z.unknown(),
    }),
    ({ sessionId, path, value }) => {
      const session = store.requireSession(sessionId);
      const field = setAnswer(session, path, value);
      return { session: summarizeSession(session), field };
    },
    {
      type: "object",
      properties: {
        sessionId: { type: "string" },
        path: { type: "string" },
        value: {},
      },
      required: ["sessionId", "path", "value"],
    },
  );

  // Navigation tools
  registerTool(
    "next_question",
    "Move to the next question in the session.",
    z.object({ sessionId: z.string() }),
    ({ sessionId }) => {
      const session = store.requireSession(sessionId);
      moveToNextQuestion(session);
      return { session: summarizeSession(session) };
    },
    sessionIdInput,
  );

  registerTool(
    "previous_question",
    "Move to the previous question in the session.",
    z.object({ sessionId: z.string() }),
    ({ sessionId }) => {
      const session = store.requireSession(sessionId);
      moveToPreviousQuestion(session);
      return { session: summarizeSession(session) };
    },
    sessionIdInput,
  );

  registerTool(
    "validate_survey",
    "Validate every answer of the session, including missing required answers and cross-field rules.",
    z.object({
      sessionId: z.string(),
    }),
    ({ sessionId }) => {
      const session = store.requireSession(sessionId);
      const errors = runValidation(session);
      return {
        session: summarizeSession(session),
        errors,
        fields: session.fields,
      };
    },
    sessionIdInput,
  );

  registerTool(
    "submit_survey",
    "Validate the session and build the survey's result. The session accepts no answers afterwards.",
    z.object({
      sessionId: z.string(),
    }),
    ({ sessionId }) => {
      const session = store.requireSession(sessionId);
      const result = submitSession(session);
      log.info({ sessionId, surveyId: session.surveyId }, "Survey submitted");
      return {
        session: summarizeSession(session),
        result,
        epilogue: session.schema.epilogue ?? null,
      };
    },
    sessionIdInput,
  );

  return server;
}

/** Serve `store` over stdio. */
export async function run(options: SurveyServerOptions): Promise<Server> {
  const server = createServer(options);
  const transport = new StdioServerTransport();
  await server.connect(transport);
  return server;
}
