/**
 * Read access to persona files (personas/<name>.json).
 * The bundled "general" persona is used when the requested one is missing.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import bundledGeneral from '../../data/personas/general.json';
import type { Persona } from '../types/analysis';
import { isMissing, readJsonFile } from '../utils/files';
import { logger } from '../utils/logger';

export const DEFAULT_PERSONA_NAME = 'general';

const agentSpecSchema = z.object({
  role: z.string().min(1),
  perspective: z.string().default(''),
  prompt: z.string().default('')
});

export const personaSchema = z.object({
  name: z.string().min(1),
  agents: z.array(agentSpecSchema)
});

export const DEFAULT_PERSONA: Persona = personaSchema.parse(bundledGeneral);

export class PersonaStore {
  private readonly log = logger.child('personas');

  constructor(private readonly personasDir: string) {}

  async list(): Promise<string[]> {
    try {
      const files = await fs.readdir(this.personasDir);
      const names = files.filter((file) => file.endsWith('.json')).map((file) => file.slice(0, -5));
      return names.includes(DEFAULT_PERSONA_NAME) ? names.sort() : [DEFAULT_PERSONA_NAME, ...names].sort();
    } catch (error) {
      if (isMissing(error)) return [DEFAULT_PERSONA_NAME];
      throw error;
    }
  }

  /**
   * The named persona, or null when no file exists for it. "general" is
   * always found, from the bundled copy when there is no file.
   */
  async find(name: string = DEFAULT_PERSONA_NAME): Promise<Persona | null> {
    try {
      return personaSchema.parse(await readJsonFile(path.join(this.personasDir, `${name}.json`)));
    } catch (error) {
      if (!isMissing(error)) throw error;
      return name === DEFAULT_PERSONA_NAME ? DEFAULT_PERSONA : null;
    }
  }

  async load(name: string = DEFAULT_PERSONA_NAME): Promise<Persona> {
    try {
      const persona = await this.find(name);
      if (persona) return persona;
      this.log.warn(`Persona '${name}' not found, using the default persona`);
    } catch (error) {
      this.log.warn(`Persona file for '${name}' is invalid, using the default persona`, { error: String(error) });
    }
    return DEFAULT_PERSONA;
  }
}
