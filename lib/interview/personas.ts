/**
 * Persona registry: the three interviewers on the panel.
 */

import type { Persona, PersonaRole, PersonaSummary } from "./types";
import { PERSONA_ROLES } from "./types";

export const PERSONA_REGISTRY: Record<PersonaRole, Persona> = {
  hr_manager: {
    role: "hr_manager",
    name: "Maria Chen",
    title: "HR Manager",
    personality:
      "Warm and attentive. Puts the candidate at ease, listens for how they reason and communicate, and keeps the interview on schedule.",
    focusAreas: ["communication", "motivation", "teamwork", "culture fit"],
  },
  tech_lead: {
    role: "tech_lead",
    name: "Alex Morgan",
    title: "Tech Lead",
    personality:
      "Direct and structured. Probes fundamentals and trade-offs, asks why a choice was made, and expects precise answers.",
    focusAreas: [
      "computer science fundamentals",
      "system design",
      "architecture",
      "trade-offs",
    ],
  },
  senior_dev: {
    role: "senior_dev",
    name: "Daniel Park",
    title: "Senior Python Developer",
    personality:
      "Practical and friendly. Cares about working code, edge cases and readability, and reviews solutions the way a teammate would.",
    focusAreas: ["code quality", "problem solving", "Python idioms", "testing"],
  },
};

export function getPersona(role: PersonaRole): Persona {
  return PERSONA_REGISTRY[role];
}

export function summarizePersona(persona: Persona): PersonaSummary {
  return { name: persona.name, title: persona.title, role: persona.role };
}

export function listPersonas(): Persona[] {
  return PERSONA_ROLES.map((role) => PERSONA_REGISTRY[role]);
}
