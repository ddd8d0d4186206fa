import { randomUUID } from "crypto";
import { EvidenceLog } from "./evidence.js";
import type {
  ResearchState,
  SessionStatus,
  Transition,
  Turn,
} from "./types.js";
import { SessionBusyError, SessionNotFoundError } from "../errors/index.js";

/**
 * Conversational research state: history, evidence and the transition log
 *
 * @remarks
 * History, evidence and transitions only ever grow. `iterationCount` counts
 * the RETRIEVING passes of the question currently being researched.
 */
export class Session {
  readonly evidence = new EvidenceLog();
  readonly createdAt = new Date();
  private readonly turns: Turn[] = [];
  private readonly transitionLog: Transition[] = [];
  private _status: SessionStatus = "active";
  private _iterationCount = 0;
  private _updatedAt = this.createdAt;
  private _busy = false;

  constructor(readonly id: string = randomUUID()) {}

  get status(): SessionStatus {
    return this._status;
  }

  get iterationCount(): number {
    return this._iterationCount;
  }

  get updatedAt(): Date {
    return this._updatedAt;
  }

  get busy(): boolean {
    return this._busy;
  }

  get history(): readonly Turn[] {
    return [...this.turns];
  }

  get transitions(): readonly Transition[] {
    return [...this.transitionLog];
  }

  /** Reopen the session for a new question */
  beginQuestion(): void {
    this._status = "active";
    this._iterationCount = 0;
    this.touch();
  }

  incrementIteration(): void {
    this._iterationCount++;
    this.touch();
  }

  recordTransition(from: ResearchState, to: ResearchState, reason: string): void {
    this.transitionLog.push({
      from,
      to,
      reason,
      iteration: this._iterationCount,
      at: new Date(),
    });
    this.touch();
  }

  /** Close the current question */
  finishQuestion(turn: Turn): void {
    this.turns.push(turn);
    this._status = turn.status;
    this.touch();
  }

  /**
   * Mark the session as researching
   * @throws SessionBusyError if a question is already in flight
   */
  acquire(): void {
    if (this._busy) throw new SessionBusyError(this.id);
    this._busy = true;
  }

  release(): void {
    this._busy = false;
  }

  private touch(): void {
    this._updatedAt = new Date();
  }
}

/**
 * In-memory registry of live sessions
 */
export class SessionStore {
  private readonly sessions = new Map<string, Session>();

  create(): Session {
    const session = new Session();
    this.sessions.set(session.id, session);
    return session;
  }

  get(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  /**
   * @throws SessionNotFoundError for unknown ids
   */
  require(sessionId: string): Session {
    const session = this.sessions.get(sessionId);
    if (!session) throw new SessionNotFoundError(sessionId);
    return session;
  }

  delete(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
