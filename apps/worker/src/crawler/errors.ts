import type { AbortReason, NavState } from "./types";

/** Ends the current session; carries the reason up to the scheduler. */
export class CrawlAbort extends Error {
  constructor(
    readonly reason: AbortReason,
    message?: string,
  ) {
    super(message ?? reason);
    this.name = "CrawlAbort";
  }
}

export class IllegalTransition extends Error {
  constructor(
    readonly from: NavState,
    readonly to: NavState,
  ) {
    super(`no transition ${from} -> ${to}`);
    this.name = "IllegalTransition";
  }
}
