/**
 * TransitionHost — one atomic transition per entry point.
 *
 * Every store a transition may touch is Journaled. The host checkpoints
 * all of them, runs the body, and either commits the buffered audit
 * records as one batch or rolls every store back and rethrows.
 *
 * Rules:
 * - `now` is read once, before the body runs
 * - Transitions never nest; a second `run` while one is active fails
 * - Records reach the event store only after the body returned, and a
 *   failed append rolls the stores back like a failed body
 * - Rollbacks run in reverse checkpoint order
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, EventSource, UnixSeconds } from "@keelson/types";
import type { EventStore } from "@keelson/event-store";
import type { Journaled, Rollback } from "@keelson/ledger";
import type { Clock } from "./types.js";
import { ProtocolError } from "./types.js";

/**
 * What a subsystem sees while it runs inside a transition.
 */
export interface TransitionContext {
  readonly operation: string;
  readonly now: UnixSeconds;
  readonly actor: string;
  readonly correlationId: string;
  /** Buffer an audit record; it is committed with the transition */
  emit(type: string, payload: Readonly<Record<string, unknown>>): void;
}

export interface TransitionHostOptions {
  readonly clock: Clock;
  readonly participants: readonly Journaled[];
  readonly events: EventStore;
  readonly streamId: string;
}

export class TransitionHost {
  private readonly clock: Clock;
  private readonly participants: readonly Journaled[];
  private readonly events: EventStore;
  private readonly streamId: string;
  private active = false;

  constructor(options: TransitionHostOptions) {
    this.clock = options.clock;
    this.participants = options.participants;
    this.events = options.events;
    this.streamId = options.streamId;
  }

  run<T>(
    operation: string,
    actor: string,
    source: EventSource,
    body: (ctx: TransitionContext) => T,
  ): T {
    if (this.active) {
      throw new ProtocolError(
        "REENTRANT_TRANSITION",
        `Cannot start "${operation}" while another transition is running`,
      );
    }

    this.active = true;
    try {
      const now = this.clock.now();
      const correlationId = randomUUID();
      const buffered: DomainEvent[] = [];
      const timestamp = new Date(now * 1000).toISOString();

      const ctx: TransitionContext = {
        operation,
        now,
        actor,
        correlationId,
        emit: (type, payload) => {
          buffered.push({
            type,
            metadata: {
              eventId: `${correlationId}:${buffered.length + 1}`,
              timestamp,
              actor,
              correlationId,
              source,
            },
            payload,
          });
        },
      };

      return this.atomically(() => {
        const result = body(ctx);
        if (buffered.length > 0) {
          this.events.append(this.streamId, buffered);
        }
        return result;
      });
    } finally {
      this.active = false;
    }
  }

  private atomically<T>(body: () => T): T {
    const rollbacks: Rollback[] = this.participants.map((p) => p.checkpoint());
    try {
      return body();
    } catch (error) {
      for (let i = rollbacks.length - 1; i >= 0; i--) {
        rollbacks[i]?.();
      }
      throw error;
    }
  }
}
