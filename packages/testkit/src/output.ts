/**
 * In-memory stand-in for the driver's process output
 */

export class BufferedOutput {
  readonly colors = false;
  #out: string[] = [];
  #err: string[] = [];

  stdout(text: string): void {
    this.#out.push(text);
  }

  stderr(text: string): void {
    this.#err.push(text);
  }

  /** Everything written to stdout */
  get out(): string {
    return this.#out.join("");
  }

  /** Everything written to stderr */
  get err(): string {
    return this.#err.join("");
  }
}
