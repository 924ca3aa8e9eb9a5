import { mkdir, readFile, writeFile } from "fs/promises";
import { dirname } from "path";
import { z } from "zod";
import type { SavedSequence } from "../types.js";

export interface SequenceStorage {
  load(): Promise<SavedSequence>;
  save(sequence: SavedSequence): Promise<void>;
}

const savedSequenceSchema = z.object({
  intervals: z.array(
    z.object({
      id: z.string().uuid(),
      durationMs: z.number().int().positive(),
      name: z.string().min(1).optional()
    })
  ),
  circular: z.boolean().default(false)
});

export function emptySequence(): SavedSequence {
  return { intervals: [], circular: false };
}

export class SequenceFileStorage implements SequenceStorage {
  private pending = Promise.resolve();

  constructor(private readonly filePath: string) {}

  async load(): Promise<SavedSequence> {
    let raw: string;
    try {
      raw = await readFile(this.filePath, "utf-8");
    } catch (error) {
      if (error instanceof Error && "code" in error && error.code === "ENOENT") {
        return emptySequence();
      }
      throw error;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      console.error(`Ignoring unreadable sequence file ${this.filePath}`, error);
      return emptySequence();
    }

    const parsed = savedSequenceSchema.safeParse(json);
    if (!parsed.success) {
      console.error(`Ignoring invalid sequence file ${this.filePath}`, parsed.error.issues);
      return emptySequence();
    }
    return parsed.data;
  }

  async save(sequence: SavedSequence): Promise<void> {
    const serialized = JSON.stringify(sequence, null, 2);
    this.pending = this.pending
      .catch(() => undefined)
      .then(async () => {
        await mkdir(dirname(this.filePath), { recursive: true });
        await writeFile(this.filePath, serialized, "utf-8");
      });
    await this.pending;
  }
}
