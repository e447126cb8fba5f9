import { describe, expect, it } from "vitest";
import { AnswerStore } from "../answerStore.js";
import { deconstruct } from "../deconstruct.js";
import { AnswerTypeMismatchError, InvalidValueError, MissingAnswerError, UnknownVariantError } from "../errors.js";
import { reconstruct, safeReconstruct } from "../reconstruct.js";
import { values } from "../responseValue.js";
import { list, struct } from "../shape.js";
import type { Infer } from "../surveyTypes.js";
import { validateField } from "../validation.js";
import { Address, Applicant, Feature, Payment, Profile } from "./fixtures.js";

const profile: Infer<typeof Profile> = {
  name: "Alice",
  age: 30,
  height: 1.7,
  subscribed: true,
  password: "test-secret",
  tags: ["a", "b"],
  scores: [3, 7],
  address: { street: "Main", city: "Reno" },
  payment: { variant: "Card", fields: { number: "4111" } },
  features: [{ variant: "Gps" }, { variant: "Camera" }],
  hobbies: [
    { variant: "Reading", fields: { genre: "sci-fi" } },
    { variant: "Running", fields: [12.5] },
  ],
};

describe("reconstruct", () => {
  it("builds a struct from its answers", () => {
    const store = AnswerStore.fromRecord({ name: values.string("Alice"), age: values.int(30) });
    expect(reconstruct(Applicant, store)).toEqual({ name: "Alice", age: 30 });
  });

  it("leaves out-of-range answers to validation", () => {
    const store = AnswerStore.fromRecord({ name: values.string("Alice") });
    expect(validateField(Applicant, "age", values.int(17), store)).toBe("Value must be at least 18");
  });

  it("builds the selected enum variant", () => {
    const store = AnswerStore.fromRecord({
      selected_alternative: values.chosenVariant(1),
      "alternatives.1.number": values.string("4111"),
    });
    expect(reconstruct(Payment, store)).toEqual({ variant: "Card", fields: { number: "4111" } });
  });

  it("builds a unit variant without fields", () => {
    const store = AnswerStore.fromRecord({ selected_alternative: values.chosenVariant(0) });
    expect(reconstruct(Payment, store)).toEqual({ variant: "Cash" });
  });

  it("rejects an unknown variant index", () => {
    const store = AnswerStore.fromRecord({ selected_alternative: values.chosenVariant(5) });
    expect(() => reconstruct(Payment, store)).toThrow(UnknownVariantError);
    expect(() => reconstruct(Payment, store)).toThrow("Unknown variant 5 at 'selected_alternative' (2 variants)");
  });

  it("ignores answers of variants that were not selected", () => {
    const store = AnswerStore.fromRecord({
      selected_alternative: values.chosenVariant(0),
      "alternatives.1.number": values.string("4111"),
    });
    expect(reconstruct(Payment, store)).toEqual({ variant: "Cash" });
  });

  it("builds nested structs and names the missing path", () => {
    const Order = struct("Order", { address: { type: Address, ask: "Address" } });
    const complete = AnswerStore.fromRecord({
      "address.street": values.string("Main"),
      "address.city": values.string("Reno"),
    });
    expect(reconstruct(Order, complete)).toEqual({ address: { street: "Main", city: "Reno" } });

    const partial = AnswerStore.fromRecord({ "address.street": values.string("Main") });
    const result = safeReconstruct(Order, partial);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(MissingAnswerError);
    expect(result.error.path.toString()).toBe("address.city");
  });

  it("builds a multi-select in ascending index order", () => {
    const Device = struct("Device", { features: { type: list(Feature), ask: "Features:", multiselect: true } });
    const store = AnswerStore.fromRecord({ features: values.chosenVariants([2, 0]) });
    expect(reconstruct(Device, store)).toEqual({ features: [{ variant: "Gps" }, { variant: "Camera" }] });
  });

  it("treats a stored index list as a set", () => {
    const Device = struct("Device", { features: { type: list(Feature), ask: "Features:", multiselect: true } });
    const store = AnswerStore.fromRecord({ features: { type: "chosenVariants", value: [2, 0, 2] } });
    expect(reconstruct(Device, store)).toEqual({ features: [{ variant: "Gps" }, { variant: "Camera" }] });
  });

  it("rejects an out-of-range multi-select index", () => {
    const Device = struct("Device", { features: { type: list(Feature), ask: "Features:", multiselect: true } });
    const store = AnswerStore.fromRecord({ features: values.chosenVariants([3]) });
    expect(() => reconstruct(Device, store)).toThrow("Unknown variant 3 at 'features' (3 variants)");
  });

  it("reports a tag mismatch", () => {
    const store = AnswerStore.fromRecord({ name: values.string("Alice"), age: values.float(30) });
    const result = safeReconstruct(Applicant, store);
    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error).toBeInstanceOf(AnswerTypeMismatchError);
    expect(result.error.message).toBe("Type mismatch at 'age': expected int, got float");
  });

  it("does not change the store and gives the same result twice", () => {
    const store = deconstruct(Profile, profile);
    const before = store.toRecord();
    const first = reconstruct(Profile, store);
    const second = reconstruct(Profile, store);
    expect(second).toEqual(first);
    expect(store.toRecord()).toEqual(before);
  });

  it("reconstructs a child shape from a prefix-filtered store alone", () => {
    const store = deconstruct(Profile, profile);
    expect(reconstruct(Address, store.filterPrefix("address"))).toEqual({ street: "Main", city: "Reno" });
    expect(reconstruct(Payment, store.filterPrefix("payment"))).toEqual({
      variant: "Card",
      fields: { number: "4111" },
    });
  });
});

describe("deconstruct", () => {
  it("round-trips a full value", () => {
    expect(reconstruct(Profile, deconstruct(Profile, profile))).toEqual(profile);
  });

  it("emits the documented store layout", () => {
    const store = deconstruct(Profile, profile);
    expect(store.get("payment.selected_alternative")).toEqual(values.chosenVariant(1));
    expect(store.get("payment.alternatives.1.number")).toEqual(values.string("4111"));
    expect(store.get("features")).toEqual(values.chosenVariants([0, 2]));
    expect(store.get("hobbies")).toEqual(values.chosenVariants([0, 1]));
    expect(store.get("hobbies.alternatives.0.genre")).toEqual(values.string("sci-fi"));
    expect(store.get("hobbies.alternatives.1.field_0")).toEqual(values.float(12.5));
    expect(store.has("notes")).toBe(false);
  });

  it("omits optional fields that are absent and restores them as absent", () => {
    const { height: _height, ...withoutHeight } = profile;
    const store = deconstruct(Profile, withoutHeight);
    expect(store.has("height")).toBe(false);
    expect(reconstruct(Profile, store)).not.toHaveProperty("height");
  });

  it("rejects values that do not fit the shape", () => {
    expect(() => deconstruct(Applicant, { name: "Alice", age: 30.5 })).toThrow(InvalidValueError);
    expect(() => deconstruct(Applicant, { name: "Alice", age: 30.5 })).toThrow(
      "Value at 'age' does not match int: 30.5",
    );
  });
});
