/**
 * Saved analysis presets (presets/<name>.json): a default query plus the
 * feed tags to analyze.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { isMissing, readJsonFile, writeJsonFile } from '../utils/files';

const presetSchema = z.object({
  name: z.string().min(1),
  tags: z.array(z.string()).default([]),
  query: z.string().default(''),
  created: z.string()
});

export type Preset = z.infer<typeof presetSchema>;

const PRESET_NAME = /^[A-Za-z0-9_-]+$/;

export class PresetStore {
  constructor(
    private readonly presetsDir: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  private fileFor(name: string): string {
    if (!PRESET_NAME.test(name)) {
      throw new Error(`Invalid preset name "${name}": use letters, digits, "-" and "_"`);
    }
    return path.join(this.presetsDir, `${name}.json`);
  }

  async save(name: string, tags: string[], query: string): Promise<Preset> {
    const preset: Preset = { name, tags, query, created: this.now().toISOString() };
    await writeJsonFile(this.fileFor(name), preset);
    return preset;
  }

  async load(name: string): Promise<Preset | null> {
    try {
      return presetSchema.parse(await readJsonFile(this.fileFor(name)));
    } catch (error) {
      if (isMissing(error)) return null;
      throw error;
    }
  }

  async list(): Promise<string[]> {
    try {
      const files = await fs.readdir(this.presetsDir);
      return files.filter((file) => file.endsWith('.json')).map((file) => file.slice(0, -5)).sort();
    } catch (error) {
      if (isMissing(error)) return [];
      throw error;
    }
  }

  async delete(name: string): Promise<boolean> {
    try {
      await fs.unlink(this.fileFor(name));
      return true;
    } catch (error) {
      if (isMissing(error)) return false;
      throw error;
    }
  }
}
