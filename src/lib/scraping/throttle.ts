import { delay } from "./utils";

/**
 * Fixed politeness delay between outbound requests. Failures do not
 * lengthen it.
 */
export class Throttle {
  private waits = 0;

  constructor(
    readonly intervalMs: number,
    private readonly sleep: (ms: number) => Promise<void> = delay
  ) {}

  async throttle(): Promise<void> {
    this.waits++;
    await this.sleep(this.intervalMs);
  }

  get count(): number {
    return this.waits;
  }
}
