/**
 * Stage runner backed by the AI SDK.
 *
 * One `generateText` call per stage: the role's persona is the system
 * prompt, the stage description plus upstream context is the user prompt,
 * and the model may call the role's tools for up to `maxSteps` rounds.
 * Retries and timeouts are whatever the SDK does; nothing is added here.
 */

import { createOpenAI, type OpenAIProvider } from "@ai-sdk/openai";
import { generateText, stepCountIs } from "ai";
import type { Logger } from "../logging/index.js";
import type { Role, Stage, StageOutput } from "../types/pipeline.js";
import type { StageRunner, StageRunRequest } from "../pipeline/executor.js";
import { selectTools } from "./tools/toolset.js";

export interface AiSdkStageRunnerOptions {
  apiKey: string;
  /** Tool-use rounds per stage */
  maxSteps: number;
  logger: Logger;
  /** Override for OpenAI-compatible endpoints */
  baseURL?: string;
}

/**
 * System prompt for a role.
 */
export function composeSystemPrompt(role: Role): string {
  return [
    `You are the ${role.title}.`,
    `Your goal: ${role.goal}`,
    role.backstory,
  ].join("\n\n");
}

/**
 * User prompt for a stage: instructions, upstream context, deliverable.
 */
export function composeStagePrompt(stage: Stage, context: string): string {
  const parts = [stage.description];
  if (context.trim() !== "") {
    parts.push(`# Context from previous stages\n\n${context}`);
  }
  parts.push(`# Expected output\n\n${stage.expectedOutput}`);
  return parts.join("\n\n");
}

export class AiSdkStageRunner implements StageRunner {
  private readonly provider: OpenAIProvider;
  private readonly maxSteps: number;
  private readonly logger: Logger;

  constructor(options: AiSdkStageRunnerOptions) {
    this.provider = createOpenAI({ apiKey: options.apiKey, baseURL: options.baseURL });
    this.maxSteps = options.maxSteps;
    this.logger = options.logger;
  }

  async runStage({ stage, context, tools }: StageRunRequest): Promise<StageOutput> {
    const { llm } = stage.role;

    const result = await generateText({
      model: this.provider.chat(llm.model),
      system: composeSystemPrompt(stage.role),
      prompt: composeStagePrompt(stage, context),
      temperature: llm.temperature,
      maxOutputTokens: llm.maxTokens,
      tools: selectTools(tools, stage.role.tools),
      stopWhen: stepCountIs(this.maxSteps),
    });

    const toolCalls = result.steps.flatMap((step) => step.toolCalls.map((call) => call.toolName));
    this.logger.debug("Model finished stage", {
      stage: stage.id,
      finishReason: result.finishReason,
      steps: result.steps.length,
      toolCalls: toolCalls.length,
    });

    return {
      text: result.text,
      metadata: {
        model: llm.model,
        finishReason: result.finishReason,
        steps: result.steps.length,
        toolCalls,
      },
    };
  }
}
