import { describe, expect, it } from "vitest";
import { AnswerStore } from "../answerStore.js";
import { SurveyBuilder } from "../builder.js";
import { deriveSchema } from "../deriveSchema.js";
import { ValidationFailedError } from "../errors.js";
import { values } from "../responseValue.js";
import { ScriptedBackend } from "../scriptedBackend.js";
import { struct } from "../shape.js";
import type { Shape } from "../surveyTypes.js";
import { validateField } from "../validation.js";
import { Address, Applicant, Payment } from "./fixtures.js";

function collect(shape: Shape, backend: ScriptedBackend): Promise<AnswerStore> {
  return backend.collect(deriveSchema(shape), new AnswerStore(), (path, value, responses) =>
    validateField(shape, path, value, responses),
  );
}

describe("ScriptedBackend", () => {
  it("returns the scripted answers it was asked for", async () => {
    const backend = new ScriptedBackend({
      name: values.string("Alice"),
      age: values.int(30),
      unrelated: values.string("ignored"),
    });
    const responses = await collect(Applicant, backend);
    expect(responses.toRecord()).toEqual({ name: values.string("Alice"), age: values.int(30) });
  });

  it("fails on the first rejected answer", async () => {
    const backend = new ScriptedBackend({ name: values.string("Alice"), age: values.int(17) });
    await expect(collect(Applicant, backend)).rejects.toThrow(ValidationFailedError);
    await expect(collect(Applicant, backend)).rejects.toThrow("Validation failed: age: Value must be at least 18");
  });

  it("fails on a missing required answer", async () => {
    const backend = new ScriptedBackend({ age: values.int(30) });
    await expect(collect(Applicant, backend)).rejects.toThrow("Validation failed: name: This field is required");
  });

  it("asks the fields of the variant chosen along the way", async () => {
    const backend = new ScriptedBackend({
      selected_alternative: values.chosenVariant(1),
      "alternatives.1.number": values.string("4111"),
    });
    const responses = await collect(Payment, backend);
    expect(responses.size).toBe(2);
    expect(responses.getString("alternatives.1.number")).toBe("4111");
  });

  it("skips an optional group the script leaves out", async () => {
    const Contact = struct("Contact", {
      name: { type: "string", ask: "Name:" },
      address: { type: Address, ask: "Address", optional: true },
    });
    const contact = await new SurveyBuilder(Contact).run(new ScriptedBackend({ name: values.string("Bo") }));
    expect(contact).toEqual({ name: "Bo" });
  });

  it("asks an optional group the script answers", async () => {
    const Contact = struct("Contact", {
      address: { type: Address, ask: "Address", optional: true },
    });
    const backend = new ScriptedBackend({ "address.street": values.string("Main") });
    await expect(new SurveyBuilder(Contact).run(backend)).rejects.toThrow(
      "Validation failed: address.city: This field is required",
    );
  });
});
