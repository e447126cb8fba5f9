import { describe, expect, it } from "vitest";
import { AnswerStore } from "../answerStore.js";
import type { SurveyBackend } from "../backend.js";
import { SurveyBuilder } from "../builder.js";
import { InvalidValueError, ValidationFailedError } from "../errors.js";
import { findQuestion } from "../questions.js";
import { ResponsePath } from "../responsePath.js";
import { values } from "../responseValue.js";
import { ScriptedBackend } from "../scriptedBackend.js";
import { struct } from "../shape.js";
import type { Infer } from "../surveyTypes.js";
import { Address, Payment, Profile } from "./fixtures.js";

const Order = struct("Order", {
  name: { type: "string", ask: "Name:" },
  address: { type: Address, ask: "Address" },
  payment: { type: Payment, ask: "How will you pay?" },
});

describe("SurveyBuilder", () => {
  it("marks suggested questions", () => {
    const schema = new SurveyBuilder(Order).suggest("name", "Ada").schema();
    expect(findQuestion(schema, "name")?.default).toEqual({ type: "suggested", value: values.string("Ada") });
    expect(findQuestion(schema, "address.street")?.default).toEqual({ type: "none" });
  });

  it("marks assumed questions", () => {
    const schema = new SurveyBuilder(Order).assume("address.city", "Paris").schema();
    expect(findQuestion(schema, "address.city")?.default).toEqual({ type: "assumed", value: values.string("Paris") });
  });

  it("lets an assumption win over a suggestion", () => {
    const schema = new SurveyBuilder(Order).suggest("name", "Ada").assume("name", "Grace").schema();
    expect(findQuestion(schema, "name")?.default).toEqual({ type: "assumed", value: values.string("Grace") });
  });

  it("encodes an enum value onto the selection and the variant fields", () => {
    const schema = new SurveyBuilder(Order)
      .suggest("payment", { variant: "Card", fields: { number: "4111" } })
      .schema();
    expect(findQuestion(schema, "payment")?.default).toEqual({
      type: "suggested",
      value: values.chosenVariant(1),
    });
    expect(findQuestion(schema, "payment.alternatives.1.number")?.default).toEqual({
      type: "suggested",
      value: values.string("4111"),
    });
  });

  it("accepts a variant name for a selection path", () => {
    const schema = new SurveyBuilder(Order).assume("payment.selected_alternative", "Cash").schema();
    expect(findQuestion(schema, "payment")?.default).toEqual({ type: "assumed", value: values.chosenVariant(0) });
  });

  it("accepts raw values whose tag fits the question", () => {
    const schema = new SurveyBuilder(Order).suggest("name", values.string("Raw")).schema();
    expect(findQuestion(schema, "name")?.default).toEqual({ type: "suggested", value: values.string("Raw") });
    expect(() => new SurveyBuilder(Order).suggest("name", values.int(3))).toThrow(
      "Expected string at 'name' but got int",
    );
  });

  it("rejects unknown paths", () => {
    expect(() => new SurveyBuilder(Order).suggest("nope", "x")).toThrow(InvalidValueError);
    expect(() => new SurveyBuilder(Order).suggest("nope", "x")).toThrow("Unknown question 'nope'");
    const stray = AnswerStore.fromRecord({ ghost: values.string("boo") });
    expect(() => new SurveyBuilder(Order).withSuggestions(stray)).toThrow("No question answers 'ghost'");
  });

  it("rejects typed values that do not fit the field", () => {
    expect(() => new SurveyBuilder(Order).suggest("name", 42)).toThrow("Value at 'name' does not match string: 42");
  });

  it("collects, validates and reconstructs", async () => {
    const backend = new ScriptedBackend({
      "address.street": values.string("Main"),
      "payment.selected_alternative": values.chosenVariant(1),
      "payment.alternatives.1.number": values.string("4111"),
    });
    const order = await new SurveyBuilder(Order).suggest("name", "Ada").assume("address.city", "Paris").run(backend);
    expect(order).toEqual({
      name: "Ada",
      address: { street: "Main", city: "Paris" },
      payment: { variant: "Card", fields: { number: "4111" } },
    });
  });

  it("never lets a backend overwrite an assumed answer", async () => {
    const backend = new ScriptedBackend({
      name: values.string("Ada"),
      "address.street": values.string("Main"),
      "address.city": values.string("Berlin"),
      "payment.selected_alternative": values.chosenVariant(0),
    });
    const order = await new SurveyBuilder(Order).assume("address.city", "Paris").run(backend);
    expect(order.address.city).toBe("Paris");
  });

  it("rebuilds an existing value from suggestions alone", async () => {
    const existing: Infer<typeof Profile> = {
      name: "Alice",
      age: 30,
      height: 1.62,
      subscribed: true,
      password: "test-secret",
      tags: ["x"],
      scores: [1, 2],
      address: { street: "Main", city: "Reno" },
      payment: { variant: "Card", fields: { number: "4111" } },
      features: [{ variant: "Bluetooth" }],
      hobbies: [
        { variant: "Reading", fields: { genre: "poetry" } },
        { variant: "Chess" },
      ],
    };
    const rebuilt = await new SurveyBuilder(Profile).withExisting(existing).run(new ScriptedBackend());
    expect(rebuilt).toEqual(existing);
  });

  it("rejects an incomplete store from the backend", async () => {
    const lazy: SurveyBackend = { collect: async () => new AnswerStore() };
    const run = new SurveyBuilder(Order).run(lazy);
    await expect(run).rejects.toBeInstanceOf(ValidationFailedError);
    await expect(run).rejects.toMatchObject({
      messages: {
        name: "This field is required",
        "address.street": "This field is required",
        "address.city": "This field is required",
        "payment.selected_alternative": "This field is required",
      },
    });
  });

  it("propagates backend failures unchanged", async () => {
    const cancelled = new Error("cancelled by user");
    const backend: SurveyBackend = { collect: () => Promise.reject(cancelled) };
    await expect(new SurveyBuilder(Order).run(backend)).rejects.toBe(cancelled);
  });

  it("passes the assumed answers and a field validator to the backend", async () => {
    const seen: { initial: Record<string, unknown>; verdict: unknown }[] = [];
    const backend: SurveyBackend = {
      collect: async (schema, initial, validate) => {
        seen.push({
          initial: initial.toRecord(),
          verdict: validate(ResponsePath.of("name"), values.int(1), initial),
        });
        return new ScriptedBackend({
          "address.street": values.string("Main"),
          "payment.selected_alternative": values.chosenVariant(0),
        }).collect(schema, initial, validate);
      },
    };
    await new SurveyBuilder(Order).assume("name", "Ada").assume("address.city", "Paris").run(backend);
    expect(seen).toEqual([
      {
        initial: { name: values.string("Ada"), "address.city": values.string("Paris") },
        verdict: "Expected string but got int",
      },
    ]);
  });
});
