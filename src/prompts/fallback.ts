import type { Persona } from "../personas/types";

/** Lines used when no text-generation provider is configured. */
export function cannedUtterances(persona: Pick<Persona, "expertise">, topic: string): string[] {
  const field = persona.expertise.toLowerCase();
  const subject = topic.trim().replace(/[?.!]+$/, "").toLowerCase();
  return [
    `As an expert in ${field}, I believe that ${subject} is an important question to discuss.`,
    `From the point of view of ${field}, there are several key aspects to this problem.`,
    `My research in ${field} points to some interesting perspectives on this topic.`,
  ];
}

/** Line used when the provider is configured but the call failed. */
export function errorUtterance(persona: Pick<Persona, "expertise">, topic: string): string {
  const subject = topic.trim().replace(/[?.!]+$/, "").toLowerCase();
  return `As an expert in ${persona.expertise.toLowerCase()}, I think that ${subject} deserves careful study.`;
}
