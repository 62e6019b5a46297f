import { TransportError } from "../core/errors.js";
import { runProcess } from "../process.js";
import type { RatingClient } from "./client.js";

export interface FabricClientOptions {
  pattern: string;
  model?: string;
  timeoutMs: number;
  binary?: string;
  run?: typeof runProcess;
}

/** Pipes content through the `fabric` CLI with a rating pattern. */
export class FabricRatingClient implements RatingClient {
  readonly name = "fabric";

  private run: typeof runProcess;
  private binary: string;

  constructor(private options: FabricClientOptions) {
    this.run = options.run ?? runProcess;
    this.binary = options.binary ?? "fabric";
  }

  buildArgs(): string[] {
    const args = ["--pattern", this.options.pattern];
    if (this.options.model) args.push("--model", this.options.model);
    return args;
  }

  async rate(input: string): Promise<string> {
    const result = await this.run(this.binary, this.buildArgs(), {
      input,
      timeoutMs: this.options.timeoutMs,
    });
    if (result.exitCode !== 0) {
      throw new TransportError(`fabric exited with ${result.exitCode}: ${result.stderr.trim()}`);
    }
    return result.stdout;
  }
}
