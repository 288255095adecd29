/**
 * Prompt builders for the three kinds of model call in a turn.
 *
 * - Mother (planner): emits the directive block
 * - Worker: answers one routed message in its role
 * - Synthesis: merges worker outputs into the user-facing reply
 */

import type { Instance, InstanceSnapshot } from "./types.js";

const MAX_PRIOR_OUTPUT_CHARS = 2000; // per prior output quoted back to a worker
const MAX_PRIOR_OUTPUTS = 3;
const MAX_PREVIOUS_RESPONSE_CHARS = 4000;

function truncate(text: string, max: number): string {
  return text.length > max
    ? text.slice(0, max) + `\n... (truncated, ${text.length - max} chars omitted)`
    : text;
}

const MOTHER_TEMPLATE = `You are the Scrum Master of a team of AI specialist instances. You never answer the user directly. You plan the work and delegate it.

## Directive Format

Reply with directives only, one per line, in this order:

1. ANALYZE: <one-line analysis of the request>
2. CREATE: <role> | <model_type> | <responsibility>
   Available model types:
   - normal: standard model for focused tasks
   - thinking: enhanced model for complex reasoning
3. TO <role or instance-id>: <detailed task for that instance>
4. SYNTHESIZE

## Rules

1. Each directive goes on its own line. No other text.
2. Declare every role with CREATE before the first TO that addresses it.
3. Always delegate with TO. Every instance you create should receive at least one task.
4. Always specify model_type in CREATE.
5. SYNTHESIZE is the last line, exactly once, with nothing after it.`;

export interface MotherPromptInput {
  userMessage: string;
  team: InstanceSnapshot[];
  /** Final answer of the previous turn, if any */
  previousResponse: string | null;
  /** Original task of the session; set on follow-up turns only */
  taskContext: string | null;
}

export function buildMotherPrompt(input: MotherPromptInput): string {
  const parts: string[] = [MOTHER_TEMPLATE, ""];

  if (input.team.length > 0) {
    parts.push(`## Current Team`);
    for (const member of input.team) {
      const duty = member.responsibility ? ` - ${member.responsibility}` : "";
      parts.push(`- ${member.id}: ${member.role}${duty} [${member.status}]`);
    }
  } else {
    parts.push(`## Current Team`, `(no instances yet)`);
  }
  parts.push("");

  if (input.taskContext !== null) {
    parts.push(
      `## Follow-up`,
      `This conversation continues the original task:`,
      input.taskContext,
      ``,
      `The team above already holds the context of that task. Address existing instances with TO and write each message in natural language, building on their earlier work. Do not CREATE a role that is already on the team.`,
      ``,
    );
  }

  if (input.previousResponse) {
    parts.push(`## Previous Response`, truncate(input.previousResponse, MAX_PREVIOUS_RESPONSE_CHARS), ``);
  }

  parts.push(`## User Request`, input.userMessage);
  return parts.join("\n");
}

/** Re-prompt after a directive block failed to parse. */
export function buildCorrectivePrompt(originalPrompt: string, problem: string): string {
  return [
    originalPrompt,
    ``,
    `## Correction`,
    `Your previous reply could not be used: ${problem}.`,
    `Reply again using only the directive format above, ending with a single SYNTHESIZE line.`,
  ].join("\n");
}

export interface WorkerPromptInput {
  instance: Instance;
  message: string;
  taskContext: string | null;
}

export function buildWorkerPrompt(input: WorkerPromptInput): string {
  const { instance } = input;
  const parts: string[] = [
    `You are the "${instance.role}" specialist on a team of AI instances.`,
  ];
  if (instance.responsibility) {
    parts.push(`Your responsibility: ${instance.responsibility}`);
  }

  if (input.taskContext) {
    parts.push(``, `## Overall Task`, input.taskContext);
  }

  const prior = instance.outputHistory.slice(-MAX_PRIOR_OUTPUTS);
  if (prior.length > 0) {
    parts.push(``, `## Your Earlier Work`);
    prior.forEach((output, i) => {
      parts.push(`--- Output ${instance.outputHistory.length - prior.length + i + 1} ---`);
      parts.push(truncate(output, MAX_PRIOR_OUTPUT_CHARS));
    });
    parts.push(`Build on this work. Do not repeat it.`);
  }

  parts.push(
    ``,
    `## Your Task`,
    input.message,
    ``,
    `Respond with your contribution only. Plain text.`,
  );
  return parts.join("\n");
}

export interface SynthesisSection {
  role: string;
  /** Worker text, or the failure marker when the worker produced nothing */
  content: string;
}

export interface SynthesisPromptInput {
  userMessage: string;
  sections: SynthesisSection[];
  taskContext: string | null;
  previousResponse: string | null;
}

export function buildSynthesisPrompt(input: SynthesisPromptInput): string {
  const parts: string[] = [
    `You are writing the final answer to a user request, using contributions gathered from several specialists.`,
    ``,
    `## User Request`,
    input.userMessage,
  ];

  if (input.taskContext && input.taskContext !== input.userMessage) {
    parts.push(``, `## Original Task`, input.taskContext);
  }
  if (input.previousResponse) {
    parts.push(``, `## Previous Answer`, truncate(input.previousResponse, MAX_PREVIOUS_RESPONSE_CHARS));
  }

  parts.push(``, `## Contributions`);
  if (input.sections.length === 0) {
    parts.push(`(none; answer from the request alone)`);
  }
  for (const section of input.sections) {
    parts.push(`--- ${section.role} ---`, section.content, ``);
  }

  parts.push(
    ``,
    `Write one cohesive answer addressed to the user.`,
    `Do not mention specialists, roles, instances or how the answer was produced.`,
    `If a contribution is marked as failed, work around the gap without drawing attention to it.`,
  );
  return parts.join("\n");
}
