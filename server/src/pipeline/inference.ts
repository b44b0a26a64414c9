import { MaxTurnsExceededError, ModelBehaviorError, Runner, setDefaultOpenAIKey } from "@openai/agents";
import type { z } from "zod";
import { MalformedResponseError, toDiagnosisError, type MalformedCode } from "./errors.js";

export type InferenceTier = "tier1" | "tier2";

export type AgentSpec<T> = {
  name: string;
  /** tier1: cheap deterministic classification; tier2: reasoning and synthesis. */
  tier: InferenceTier;
  instructions: string;
  outputType: z.ZodType<T, z.ZodTypeDef, unknown>;
  /** Builds the Agents SDK agent bound to a concrete model. */
  makeAgent(model: string): unknown;
};

export type InferenceRequest<T> = {
  agent: AgentSpec<T>;
  prompt: string;
  /** How a response that fails `agent.outputType` is classified. */
  onMalformed: MalformedCode;
};

export interface InferenceBackend {
  invoke<T>(request: InferenceRequest<T>, options: { signal: AbortSignal }): Promise<T>;
}

export function parseAgentOutput<T>(request: InferenceRequest<T>, output: unknown): T {
  const parsed = request.agent.outputType.safeParse(output);
  if (!parsed.success) {
    const first = parsed.error.issues[0];
    const where = first ? `${first.path.join(".") || "(root)"}: ${first.message}` : parsed.error.message;
    throw new MalformedResponseError(request.onMalformed, `${request.agent.name} returned invalid output (${where})`);
  }
  return parsed.data;
}

/**
 * Prompts carry their facts as fenced JSON sections so that any backend, including the
 * deterministic one, reads the same inputs the model sees.
 */
export function jsonSection(title: string, value: unknown): string {
  return `### ${title} (JSON)\n${JSON.stringify(value, null, 2)}\n### END ${title}`;
}

export function readJsonSection(prompt: string, title: string): unknown {
  const start = prompt.indexOf(`### ${title} (JSON)\n`);
  if (start === -1) return undefined;
  const bodyStart = start + `### ${title} (JSON)\n`.length;
  const end = prompt.indexOf(`\n### END ${title}`, bodyStart);
  if (end === -1) return undefined;
  try {
    return JSON.parse(prompt.slice(bodyStart, end));
  } catch {
    return undefined;
  }
}

export type OpenAiAgentsBackendOptions = {
  apiKey: string;
  models: Record<InferenceTier, string>;
  maxTurns?: number;
};

export class OpenAiAgentsBackend implements InferenceBackend {
  private readonly runner = new Runner();
  private readonly agents = new Map<string, unknown>();
  private readonly maxTurns: number;

  constructor(private readonly options: OpenAiAgentsBackendOptions) {
    setDefaultOpenAIKey(options.apiKey);
    this.maxTurns = options.maxTurns ?? 3;
  }

  private agentFor<T>(spec: AgentSpec<T>): unknown {
    const cached = this.agents.get(spec.name);
    if (cached) return cached;
    const agent = spec.makeAgent(this.options.models[spec.tier]);
    this.agents.set(spec.name, agent);
    return agent;
  }

  async invoke<T>(request: InferenceRequest<T>, options: { signal: AbortSignal }): Promise<T> {
    const agent = this.agentFor(request.agent);
    let output: unknown;
    try {
      const result = await this.runner.run(agent as never, request.prompt, {
        maxTurns: this.maxTurns,
        signal: options.signal
      });
      output = result.finalOutput;
    } catch (err) {
      // The SDK raises these when structured output fails its schema or never converges.
      if (err instanceof ModelBehaviorError || err instanceof MaxTurnsExceededError) {
        throw new MalformedResponseError(request.onMalformed, `${request.agent.name}: ${err.message}`, err);
      }
      throw toDiagnosisError(err, options.signal);
    }
    return parseAgentOutput(request, output);
  }
}
