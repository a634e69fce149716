import type { Drain } from "../interfaces/drain.js";

/** Accepts every record and does nothing with it. */
export class Discard implements Drain {
  log(): void {}

  isEnabled(): boolean {
    return false;
  }
}

/** Shared singleton — use as the default when no drain is supplied. */
export const discard: Drain = new Discard();
