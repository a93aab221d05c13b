/**
 * Agent deployment descriptor schema.
 *
 * A deployment descriptor names the language-model configuration that every
 * role in a run shares. Descriptors are validated once when loaded and then
 * treated as read-only: a different model or temperature means a new
 * descriptor, not a mutated one.
 */

import { z } from "zod";

/**
 * Language-model configuration shared by all roles of a run.
 */
export const LlmConfigSchema = z
  .object({
    /** Label for this configuration */
    configName: z.string().min(1).describe("Name of this model configuration"),

    /** Client library used to reach the model */
    client: z.enum(["openai"]).describe("Chat-completion client"),

    /** Model identifier passed to the provider */
    model: z.string().min(1).describe("Model identifier, e.g. gpt-4o"),

    /** Sampling temperature */
    temperature: z
      .number()
      .min(0)
      .max(2)
      .describe("Sampling temperature between 0 and 2"),

    /** Upper bound on generated tokens per stage */
    maxTokens: z
      .number()
      .int()
      .positive()
      .optional()
      .describe("Maximum output tokens per stage"),
  })
  .strict();

export type LlmConfig = z.infer<typeof LlmConfigSchema>;

export const AgentConfigSchema = z
  .object({
    llmConfig: LlmConfigSchema.describe("Model configuration for all roles"),

    /** Tool-use rounds allowed per stage before the model must answer */
    maxSteps: z
      .number()
      .int()
      .min(1)
      .max(20)
      .default(5)
      .describe("Maximum reasoning/tool-use steps per stage"),
  })
  .strict();

export type AgentConfig = z.infer<typeof AgentConfigSchema>;

export const AgentDeploymentSchema = z
  .object({
    name: z.string().min(1).describe("Deployment name"),
    module: z.string().min(1).describe("Module this deployment runs"),
    agentConfig: AgentConfigSchema,
  })
  .strict();

export type AgentDeployment = z.infer<typeof AgentDeploymentSchema>;

export const AgentDeploymentListSchema = z
  .array(AgentDeploymentSchema)
  .min(1)
  .describe("At least one deployment descriptor");
