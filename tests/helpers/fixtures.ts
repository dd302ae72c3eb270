import { OpportunitySchema, type Opportunity } from "../../src/extraction/opportunity-parser.js";

export function makeOpportunity(fields: Record<string, unknown> = {}): Opportunity {
  return OpportunitySchema.parse({
    job_code: "M-101",
    job_description: "Vibration monitoring of adjacent structures during pile driving",
    project_location: "Springfield, IL",
    match_confidence: 70,
    ...fields,
  });
}

export function opportunitiesJson(items: Array<Record<string, unknown>>): string {
  return JSON.stringify({ instrumentation_opportunities: items });
}

type Reply = string | Error | ((prompt: string) => string);

/** Completion service that answers from a script and records every prompt. */
export class ScriptedCompletion {
  readonly prompts: string[] = [];
  private readonly replies: Reply[];
  private readonly fallback: Reply;

  constructor(replies: Reply[], fallback: Reply = opportunitiesJson([])) {
    this.replies = [...replies];
    this.fallback = fallback;
  }

  async complete(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const reply = this.replies.shift() ?? this.fallback;
    if (reply instanceof Error) throw reply;
    return typeof reply === "function" ? reply(prompt) : reply;
  }
}
