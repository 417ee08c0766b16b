// processor.ts: Parse one utterance, run its handler, report the outcome
// Failures stay at message granularity: nothing thrown here escapes to the connection.

import type { Logger } from "pino";
import type { CommandGrammar, CommandHandler, ParseResult } from "./registry.js";
import { errorMessage } from "./errors.js";
import { logger as rootLogger } from "./logger.js";
import { recordOutcome } from "./stats.js";
import {
  cancelled,
  handled,
  handlerFailed,
  unrecognized,
  type Outcome,
} from "./protocol.js";

export interface ProcessContext {
  connectionId: string;
  signal: AbortSignal;
  logger?: Logger;
}

/** Receives every message outcome; the default one logs and counts. */
export interface OutcomeObserver {
  onOutcome(outcome: Outcome, ctx: { connectionId: string; logger: Logger }): void;
}

export const loggingObserver: OutcomeObserver = {
  onOutcome(outcome, { logger }) {
    recordOutcome(outcome.kind);
    switch (outcome.kind) {
      case "handled":
        logger.debug({ pattern: outcome.pattern, durationMs: outcome.durationMs }, "Command handled");
        break;
      case "unrecognized":
        logger.info({ text: outcome.text, reason: outcome.reason }, outcome.message);
        break;
      case "handler_failed":
        logger.warn({ pattern: outcome.pattern, err: outcome.cause }, "Command handler failed");
        break;
      case "cancelled":
        logger.debug({ pattern: outcome.pattern }, "Command cancelled");
        break;
      case "rejected":
        logger.warn({ text: outcome.text }, "Command dropped: too many commands in flight");
        break;
    }
  },
};

/** The part of a compiled grammar the processor relies on. */
export type CommandTable = Pick<CommandGrammar, "parse" | "handlerFor" | "patterns">;

export class CommandProcessor {
  constructor(
    readonly grammar: CommandTable,
    private readonly observer: OutcomeObserver = loggingObserver,
  ) {}

  async process(text: string, ctx: ProcessContext): Promise<Outcome> {
    const log = ctx.logger ?? rootLogger.child({ connection: ctx.connectionId });
    const outcome = await this.run(text, ctx, log);
    this.report(outcome, ctx.connectionId, log);
    return outcome;
  }

  /** Hand an outcome produced outside process() (e.g. by admission control) to the observer. */
  report(outcome: Outcome, connectionId: string, log: Logger = rootLogger.child({ connection: connectionId })): void {
    try {
      this.observer.onOutcome(outcome, { connectionId, logger: log });
    } catch (err) {
      log.error({ err }, "Outcome observer failed");
    }
  }

  private async run(text: string, ctx: ProcessContext, log: Logger): Promise<Outcome> {
    let parsed: ParseResult;
    try {
      parsed = this.grammar.parse(text);
    } catch (err) {
      log.error({ err }, "Grammar failed while parsing");
      return unrecognized(text, `Parse failed: ${errorMessage(err)}`);
    }
    if (!parsed.ok) return unrecognized(text, parsed.error.message);

    const { pattern, args } = parsed.command;
    let handler: CommandHandler | undefined;
    try {
      handler = this.grammar.handlerFor(pattern);
    } catch (err) {
      return handlerFailed(pattern, err);
    }
    if (!handler) return handlerFailed(pattern, new Error(`No handler for "${pattern}"`));

    const started = performance.now();
    try {
      await handler(args, {
        connectionId: ctx.connectionId,
        signal: ctx.signal,
        logger: log.child({ pattern }),
      });
    } catch (err) {
      if (ctx.signal.aborted) return cancelled(pattern);
      return handlerFailed(pattern, err);
    }
    return handled(pattern, Math.round(performance.now() - started));
  }
}
