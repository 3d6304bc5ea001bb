import { z } from "zod";
import { loadDataFile } from "../../utils/dataFile";
import type { Persona, PersonaKey } from "./types";

const personaEntrySchema = z.object({
  persona_description: z.string().min(1),
  evaluation_focus: z.string().min(1),
  question_style_guide: z.string().min(1)
});

const personasSchema = z.object({
  team_lead: personaEntrySchema,
  executive: personaEntrySchema
});

export function loadPersona(key: PersonaKey): Persona {
  const personas = loadDataFile("personas.json", personasSchema);
  return { key, ...personas[key] };
}
