import type { SurveyDefinition } from "../sessionTypes.js";
import { enumeration, list, struct } from "../shape.js";

export const Contact = struct(
  "Contact",
  {
    fullName: { type: "string", ask: "Full name:" },
    age: { type: "int", ask: "Age:", min: 0, max: 130, optional: true },
    email: {
      type: "string",
      ask: "Email address:",
      validate: (value) => (value.type === "string" && value.value.includes("@") ? true : "Enter an email address"),
    },
    bio: { type: "string", ask: "Short bio:", multiline: true, optional: true },
  },
  { prelude: "A few details so we can get back to you." },
);

export const Pet = enumeration("Pet", {
  Dog: { ask: "A dog", fields: { name: { type: "string", ask: "Dog's name:" } } },
  Cat: { ask: "A cat", fields: { name: { type: "string", ask: "Cat's name:" }, indoor: { type: "bool", ask: "Indoor cat?" } } },
  None: { ask: "No pet" },
});

export const Hobby = enumeration("Hobby", {
  Reading: { ask: "Reading", fields: { genre: { type: "string", ask: "Favourite genre:" } } },
  Running: { ask: "Running", fields: [{ type: "float", ask: "Weekly distance (km):", min: 0 }] },
  Chess: { ask: "Chess" },
});

export const Household = struct(
  "Household",
  {
    members: { type: "int", ask: "People in the household:", min: 1, max: 20 },
    adults: { type: "int", ask: "Adults in the household:", min: 1, max: 20 },
    pet: { type: Pet, ask: "Do you have a pet?" },
    hobbies: { type: list(Hobby), ask: "Hobbies:", multiselect: true },
  },
  {
    epilogue: "Thanks for taking part.",
    validate: (responses): Record<string, string> => {
      const members = responses.getOptionalInt("members");
      const adults = responses.getOptionalInt("adults");
      if (members !== undefined && adults !== undefined && adults > members) {
        return { adults: "Cannot be more than the household size" };
      }
      return {};
    },
  },
);

export const demoSurveys: SurveyDefinition[] = [
  { id: "demo-contact", name: "Demo Contact Survey", shape: Contact },
  {
    id: "demo-household",
    name: "Demo Household Survey",
    description: "Household size, pets and hobbies.",
    shape: Household,
  },
];
