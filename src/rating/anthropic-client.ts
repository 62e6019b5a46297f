import Anthropic from "@anthropic-ai/sdk";
import { TimeoutError, TransportError, errorMessage } from "../core/errors.js";
import type { RatingClient } from "./client.js";

// Asks for the same layout the fabric rate_content pattern produces, so one
// extractor handles both clients.
const SYSTEM_PROMPT = `You rate content for a personal reading list. Judge how much insight, novelty and practical value the content offers.

Respond in exactly this format:

RATING:

<S|A|B|C|D> Tier: (<short tier description>)

Explanation:
- <reason>
- <reason>
- <reason>

Tiers: S = must consume original, A = consume original, B = consume original when time allows, C = maybe skim the summary, D = skip.`;

export interface AnthropicClientOptions {
  apiKey: string;
  model: string;
  timeoutMs: number;
}

export class AnthropicRatingClient implements RatingClient {
  readonly name = "anthropic";

  private client: Anthropic;

  constructor(private options: AnthropicClientOptions) {
    this.client = new Anthropic({ apiKey: options.apiKey, timeout: options.timeoutMs, maxRetries: 0 });
  }

  async rate(input: string): Promise<string> {
    const response = await this.client.messages
      .create({
        model: this.options.model,
        max_tokens: 1024,
        system: SYSTEM_PROMPT,
        messages: [{ role: "user", content: input }],
      })
      .catch((err: unknown) => {
        throw this.wrapError(err);
      });

    const block = response.content[0];
    if (!block || block.type !== "text") {
      throw new TransportError(`Expected a text block, got ${block?.type ?? "nothing"}`);
    }
    return block.text;
  }

  private wrapError(err: unknown): Error {
    if (err instanceof Anthropic.APIConnectionTimeoutError) {
      return new TimeoutError("anthropic rating", this.options.timeoutMs);
    }
    return new TransportError(`Anthropic request failed: ${errorMessage(err)}`, { cause: err });
  }
}
