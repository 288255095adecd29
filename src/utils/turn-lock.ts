import { TurnCancelledError, TurnInProgressError } from "../errors.js";

/** Admits one turn at a time; the holder's controller lets the turn be cancelled. */
export class TurnLock {
  private active: AbortController | null = null;

  get isLocked(): boolean {
    return this.active !== null;
  }

  lock(): AbortController {
    if (this.active) throw new TurnInProgressError();
    const controller = new AbortController();
    this.active = controller;
    return controller;
  }

  unlock(controller: AbortController): void {
    if (this.active === controller) this.active = null;
  }

  cancel(): boolean {
    if (!this.active) return false;
    this.active.abort(new TurnCancelledError());
    return true;
  }
}
