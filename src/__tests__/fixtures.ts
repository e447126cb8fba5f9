import { enumeration, list, struct } from "../shape.js";

export const Applicant = struct("Applicant", {
  name: { type: "string", ask: "Name:" },
  age: { type: "int", ask: "Age:", min: 18, max: 120 },
});

export const Payment = enumeration("Payment", {
  Cash: {},
  Card: { ask: "Card", fields: { number: { type: "string", ask: "Card number:" } } },
});

export const Address = struct("Address", {
  street: { type: "string", ask: "Street:" },
  city: { type: "string", ask: "City:" },
});

export const Feature = enumeration("Feature", {
  Gps: {},
  Bluetooth: {},
  Camera: {},
});

export const Hobby = enumeration("Hobby", {
  Reading: { fields: { genre: { type: "string", ask: "Genre:" } } },
  Running: { fields: [{ type: "float", ask: "Weekly km:", min: 0 }] },
  Chess: {},
});

export const Profile = struct(
  "Profile",
  {
    name: { type: "string", ask: "Name:" },
    age: { type: "int", ask: "Age:", min: 1, max: 100 },
    height: { type: "float", ask: "Height (m):", optional: true },
    subscribed: { type: "bool", ask: "Subscribe?" },
    password: { type: "string", ask: "Password:", mask: true },
    notes: { type: "string", ask: "Notes:", multiline: true, optional: true },
    tags: { type: list("string"), ask: "Tags:" },
    scores: { type: list("int"), ask: "Scores:", min: 0, max: 10 },
    address: { type: Address, ask: "Address" },
    payment: { type: Payment, ask: "How will you pay?" },
    features: { type: list(Feature), ask: "Features:", multiselect: true },
    hobbies: { type: list(Hobby), ask: "Hobbies:", multiselect: true },
  },
  { prelude: "Tell us about yourself.", epilogue: "Done." },
);
