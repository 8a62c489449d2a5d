import { Agent, run, setDefaultOpenAIKey } from '@openai/agents';
import { logger } from '../utils/logger';
import { GenerationError, toError } from '../utils/errors';
import { executeWithTimeout } from '../utils/timeout';

/**
 * Who is speaking: the handler-specific name and system instructions for a
 * generation call.
 */
export interface GenerationPersona {
  name: string;
  instructions: string;
}

/**
 * Opaque text-completion service. Rejects with GenerationError on timeout,
 * empty output or any backend failure.
 */
export interface GenerationBackend {
  generate(prompt: string, persona: GenerationPersona): Promise<string>;
}

/**
 * Runs one prompt against one persona and returns the raw output.
 */
export type PromptRunner = (prompt: string, persona: GenerationPersona) => Promise<string | undefined>;

export interface AgentsBackendOptions {
  apiKey?: string;
  model: string;
  timeoutMs: number;
}

/**
 * Generation backend on top of the OpenAI Agents SDK. One Agent is built per
 * persona and reused across calls.
 */
export class AgentsGenerationBackend implements GenerationBackend {
  private agents: Map<string, Agent> = new Map();
  private readonly runPrompt: PromptRunner;

  constructor(private readonly options: AgentsBackendOptions, runner?: PromptRunner) {
    if (options.apiKey) {
      setDefaultOpenAIKey(options.apiKey);
    }
    this.runPrompt = runner ?? ((prompt, persona) => this.runAgent(prompt, persona));
  }

  async generate(prompt: string, persona: GenerationPersona): Promise<string> {
    const startTime = Date.now();
    let output: string | undefined;

    try {
      output = await executeWithTimeout(
        () => this.runPrompt(prompt, persona),
        this.options.timeoutMs,
        () => new GenerationError('timeout', `Generation timed out after ${this.options.timeoutMs}ms`)
      );
    } catch (error) {
      if (error instanceof GenerationError) {
        throw error;
      }
      throw new GenerationError('backend', toError(error).message, error);
    }

    const text = output?.trim();
    if (!text) {
      throw new GenerationError('empty', `${persona.name} produced no output`);
    }

    logger.debug('Generation completed', {
      operation: 'generation',
      handler: persona.name
    }, {
      durationMs: Date.now() - startTime,
      promptLength: prompt.length,
      outputLength: text.length
    });

    return text;
  }

  private async runAgent(prompt: string, persona: GenerationPersona): Promise<string | undefined> {
    const result = await run(this.agentFor(persona), prompt);
    const output = result.finalOutput;
    return typeof output === 'string' ? output : undefined;
  }

  private agentFor(persona: GenerationPersona): Agent {
    let agent = this.agents.get(persona.name);
    if (!agent) {
      agent = new Agent({
        name: persona.name,
        instructions: persona.instructions,
        model: this.options.model
      });
      this.agents.set(persona.name, agent);
    }
    return agent;
  }
}
