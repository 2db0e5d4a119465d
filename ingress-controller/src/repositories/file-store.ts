import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import type { RelationPayload } from '../types/ingress';
import { parseOrThrow, pickRelationPayload, storedPayloadSchema } from '../utils/validation';
import type { StateStore } from './state-store';

interface StateFile {
  ingress_relation_data: RelationPayload;
  updated_at: string;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FileStateStore implements StateStore {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  async load(): Promise<RelationPayload> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (isMissingFileError(error)) {
        return {};
      }
      throw error;
    }

    const parsed: unknown = JSON.parse(raw);
    const stored =
      typeof parsed === 'object' && parsed !== null && 'ingress_relation_data' in parsed
        ? parsed.ingress_relation_data
        : {};
    return pickRelationPayload(parseOrThrow(storedPayloadSchema, stored));
  }

  async save(payload: RelationPayload): Promise<void> {
    const state: StateFile = {
      ingress_relation_data: payload,
      updated_at: new Date().toISOString(),
    };

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      await fs.writeFile(tempPath, `${JSON.stringify(state, null, 2)}\n`, 'utf8');
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.rm(tempPath, { force: true });
      throw error;
    }
  }
}
