/**
 * In-memory session store for the HTTP API. Sessions live until deleted
 * or the process exits.
 */

import type { TemplateBinder } from "../templates/binder.js";
import { AuthoringSession, type SessionOptions } from "./session.js";

export class SessionStore {
  private sessions = new Map<string, AuthoringSession>();

  constructor(
    private readonly binder: TemplateBinder,
    private readonly defaults: Omit<SessionOptions, "id"> = {},
  ) {}

  create(): AuthoringSession {
    const session = new AuthoringSession(this.binder, this.defaults);
    this.sessions.set(session.id, session);
    return session;
  }

  get(sessionId: string): AuthoringSession | undefined {
    return this.sessions.get(sessionId);
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
