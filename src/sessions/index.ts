/**
 * Session persistence: conversation, VM position and variables on disk
 */

import { randomUUID } from 'crypto';
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';

import { conversationSchema } from '../conversation/json.js';
import { SessionNotFoundError } from '../errors.js';

const sessionSchema = z.object({
  sessionId: z.string(),
  savedAt: z.string(),
  conversation: conversationSchema,
  vmState: z.object({
    filename: z.string(),
    ip: z.number().int().nonnegative(),
    modelId: z.string().nullable(),
  }),
  variables: z.record(z.unknown()),
  totals: z.object({
    tokensIn: z.number().nonnegative(),
    tokensOut: z.number().nonnegative(),
    cost: z.number().nonnegative(),
  }),
});

export type SessionSnapshot = z.infer<typeof sessionSchema>;

export type NewSession = Omit<SessionSnapshot, 'sessionId' | 'savedAt'> & {
  sessionId?: string | undefined;
};

export interface SessionStore {
  save(snapshot: NewSession): string;
  load(sessionId: string): SessionSnapshot;
}

/**
 * One JSON file per session under a directory
 */
export class FileSessionStore implements SessionStore {
  constructor(private readonly directory: string) {}

  save(snapshot: NewSession): string {
    const sessionId = snapshot.sessionId ?? newSessionId();
    const record: SessionSnapshot = {
      ...snapshot,
      sessionId,
      savedAt: new Date().toISOString(),
    };
    if (!fs.existsSync(this.directory)) {
      fs.mkdirSync(this.directory, { recursive: true });
    }
    fs.writeFileSync(this.filePath(sessionId), JSON.stringify(record, null, 2));
    return sessionId;
  }

  load(sessionId: string): SessionSnapshot {
    const file = this.filePath(sessionId);
    if (!fs.existsSync(file)) {
      throw new SessionNotFoundError(sessionId);
    }
    const data: unknown = JSON.parse(fs.readFileSync(file, 'utf-8'));
    return sessionSchema.parse(data);
  }

  list(): string[] {
    if (!fs.existsSync(this.directory)) {
      return [];
    }
    return fs
      .readdirSync(this.directory)
      .filter((name) => name.endsWith('.json'))
      .map((name) => path.basename(name, '.json'))
      .sort();
  }

  private filePath(sessionId: string): string {
    // Ids are file names; reject anything that could leave the directory
    if (!/^[A-Za-z0-9_-]+$/.test(sessionId)) {
      throw new SessionNotFoundError(sessionId);
    }
    return path.join(this.directory, `${sessionId}.json`);
  }
}

/**
 * Short random id, e.g. "3f9a1c2b"
 */
export function newSessionId(): string {
  return randomUUID().replace(/-/g, '').slice(0, 8);
}
