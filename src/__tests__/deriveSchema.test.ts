import { describe, expect, it } from "vitest";
import { deriveSchema } from "../deriveSchema.js";
import { AuthoringError } from "../errors.js";
import { walkQuestions } from "../questions.js";
import { enumeration, list, struct } from "../shape.js";
import type { FieldDecl, Question } from "../surveyTypes.js";
import { Applicant, Payment, Profile } from "./fixtures.js";

function paths(questions: Question[]): string[] {
  const all: string[] = [];
  walkQuestions(questions, (question) => all.push(question.path.toString()));
  return all;
}

describe("deriveSchema", () => {
  it("turns struct fields into questions in declaration order", () => {
    const schema = deriveSchema(Applicant);
    expect(schema.questions.map((q) => q.path.toString())).toEqual(["name", "age"]);
    const [name, age] = schema.questions;
    expect(name?.prompt).toBe("Name:");
    expect(name?.kind).toEqual({ type: "input" });
    expect(name?.default).toEqual({ type: "none" });
    expect(age?.kind).toEqual({ type: "int", min: 18, max: 120 });
  });

  it("picks the question kind from the field declaration", () => {
    const kinds = Object.fromEntries(deriveSchema(Profile).questions.map((q) => [q.path.toString(), q.kind.type]));
    expect(kinds).toEqual({
      name: "input",
      age: "int",
      height: "float",
      subscribed: "confirm",
      password: "masked",
      notes: "multiline",
      tags: "list",
      scores: "list",
      address: "allOf",
      payment: "oneOf",
      features: "anyOf",
      hobbies: "anyOf",
    });
  });

  it("keeps list element bounds and optional flags", () => {
    const questions = deriveSchema(Profile).questions;
    const scores = questions.find((q) => q.path.toString() === "scores");
    expect(scores?.kind).toEqual({ type: "list", element: "int", min: 0, max: 10 });
    expect(questions.find((q) => q.path.toString() === "height")?.optional).toBe(true);
    expect(questions.find((q) => q.path.toString() === "name")?.optional).toBe(false);
  });

  it("nests struct fields under the field path", () => {
    const address = deriveSchema(Profile).questions.find((q) => q.path.toString() === "address");
    expect(address?.kind.type === "allOf" && address.kind.questions.map((q) => q.path.toString())).toEqual([
      "address.street",
      "address.city",
    ]);
  });

  it("lays enum variants out under alternatives.<index>", () => {
    const payment = deriveSchema(Profile).questions.find((q) => q.path.toString() === "payment");
    expect(payment?.prompt).toBe("How will you pay?");
    expect(paths(payment ? [payment] : [])).toEqual([
      "payment",
      "payment.alternatives.0",
      "payment.alternatives.1",
      "payment.alternatives.1.number",
    ]);
    if (payment?.kind.type !== "oneOf") throw new Error("expected oneOf");
    const [cash, card] = payment.kind.variants;
    expect(cash?.kind).toEqual({ type: "unit" });
    expect(cash?.prompt).toBe("Cash");
    expect(card?.prompt).toBe("Card");
  });

  it("names positional variant fields field_N", () => {
    const hobbies = deriveSchema(Profile).questions.find((q) => q.path.toString() === "hobbies");
    expect(paths(hobbies ? [hobbies] : [])).toEqual([
      "hobbies",
      "hobbies.alternatives.0",
      "hobbies.alternatives.0.genre",
      "hobbies.alternatives.1",
      "hobbies.alternatives.1.field_0",
      "hobbies.alternatives.2",
    ]);
  });

  it("derives a top-level enum as one question at the root", () => {
    const schema = deriveSchema(Payment);
    expect(schema.questions).toHaveLength(1);
    const [root] = schema.questions;
    expect(root?.path.isRoot).toBe(true);
    expect(root?.prompt).toBe("Payment");
    expect(paths(schema.questions)).toEqual(["", "alternatives.0", "alternatives.1", "alternatives.1.number"]);
  });

  it("copies prelude and epilogue", () => {
    const schema = deriveSchema(Profile);
    expect(schema.prelude).toBe("Tell us about yourself.");
    expect(schema.epilogue).toBe("Done.");
  });

  it("never produces two questions with the same path", () => {
    const all = paths(deriveSchema(Profile).questions);
    expect(new Set(all).size).toBe(all.length);
  });

  it("is deterministic and returns a fresh tree each call", () => {
    const first = deriveSchema(Profile);
    const second = deriveSchema(Profile);
    expect(paths(first.questions)).toEqual(paths(second.questions));
    first.questions.pop();
    expect(deriveSchema(Profile).questions).toHaveLength(12);
  });
});

describe("deriveSchema authoring errors", () => {
  const expectAuthoringError = (build: () => unknown, message: string): void => {
    expect(build).toThrow(AuthoringError);
    expect(build).toThrow(message);
  };

  it("requires prompt text", () => {
    expectAuthoringError(
      () => deriveSchema(struct("Bad", { x: { type: "string" } })),
      "Bad.x: missing prompt text (ask)",
    );
  });

  it("rejects min above max", () => {
    expectAuthoringError(
      () => deriveSchema(struct("Bad", { n: { type: "int", ask: "N", min: 5, max: 1 } })),
      "Bad.n: min (5) is greater than max (1)",
    );
  });

  it("rejects display attributes on the wrong type", () => {
    expectAuthoringError(
      () => deriveSchema(struct("Bad", { n: { type: "int", ask: "N", mask: true } })),
      "Bad.n: mask applies to string fields only",
    );
    expectAuthoringError(
      () => deriveSchema(struct("Bad", { s: { type: "string", ask: "S", min: 1 } })),
      "Bad.s: bounds apply to numeric fields only",
    );
  });

  it("rejects multiselect outside a list of an enum", () => {
    expectAuthoringError(
      () => deriveSchema(struct("Bad", { s: { type: "string", ask: "S", multiselect: true } })),
      "Bad.s: multiselect requires a list of an enum",
    );
    expectAuthoringError(
      () => deriveSchema(struct("Bad", { s: { type: list("string"), ask: "S", multiselect: true } })),
      "Bad.s: multiselect requires a list of an enum, got list<string>",
    );
  });

  it("requires multiselect on a list of an enum", () => {
    expectAuthoringError(
      () => deriveSchema(struct("Bad", { p: { type: list(Payment), ask: "P" } })),
      "Bad.p: a list of an enum needs multiselect",
    );
  });

  it("rejects an enum without variants", () => {
    expectAuthoringError(() => deriveSchema(enumeration("Empty", {})), "Enum 'Empty' has no variants");
  });

  it("rejects reserved field names", () => {
    expectAuthoringError(
      () => deriveSchema(struct("Bad", { selected_alternative: { type: "int", ask: "N" } })),
      "Bad.selected_alternative: 'selected_alternative' is a reserved segment",
    );
  });

  it("rejects recursive shapes", () => {
    const fields: Record<string, FieldDecl> = {};
    const Node = struct("Node", fields);
    fields.next = { type: Node, ask: "Next" };
    expectAuthoringError(() => deriveSchema(Node), "Recursive shape: Node -> Node");
  });

  it("rejects a dotted field name that collides with a nested path", () => {
    const Inner = struct("Inner", { b: { type: "string", ask: "B" } });
    const Ambiguous = struct("Ambiguous", {
      "a.b": { type: "string", ask: "Literal" },
      a: { type: Inner, ask: "A" },
    });
    expectAuthoringError(() => deriveSchema(Ambiguous), `Ambiguous path 'a.b': segments ["a.b"] and ["a","b"]`);
  });

  it("accepts a dotted field name with no nested twin", () => {
    const Dotted = struct("Dotted", { "a.b": { type: "string", ask: "Literal" } });
    expect(deriveSchema(Dotted).questions[0]?.path.segments).toEqual(["a.b"]);
  });
});
