/**
 * Research System
 * Wires the discovery and extraction clients, the agents and observability
 * into research sessions
 */

import { getBaseConfig, type BaseConfig } from "@deepsearch/core";
import { createBraveSearchClient, createFirecrawlExtractor } from "@deepsearch/web";
import type { IExecutor } from "../../shared/executor/types.js";
import type { IObservability } from "../../shared/observability/types.js";
import { createClaudeExecutor } from "../../shared/executor/claude.js";
import { createConsoleObservability } from "../../shared/observability/console.js";
import { QueryDeriverAgent } from "./agents/query-deriver/agent.js";
import { ReportSynthesizerAgent } from "./agents/synthesizer/agent.js";
import { defaultSettings, type ResearchSettings } from "./schema.js";
import { Session } from "./session.js";
import type { SessionCollaborators } from "./types.js";

/**
 * Dependencies for the research system; anything omitted is built from configuration
 */
export interface ResearchDependencies extends SessionCollaborators {
  executor: IExecutor;
  observability: IObservability;
}

export interface ResearchSystemOptions {
  config?: BaseConfig;
}

export class ResearchSystem {
  readonly name = "research";
  readonly version = "1.0.0";

  private readonly config: BaseConfig;
  private readonly deps: ResearchDependencies;

  constructor(options: ResearchSystemOptions = {}, deps: Partial<ResearchDependencies> = {}) {
    this.config = options.config ?? getBaseConfig();

    const observability =
      deps.observability ??
      createConsoleObservability({ systemName: this.name, logLevel: this.config.env.logLevel });
    const executor = deps.executor ?? createClaudeExecutor();
    const agentDeps = { executor, observability };

    this.deps = {
      executor,
      observability,
      discoverer:
        deps.discoverer ?? createBraveSearchClient({ apiKey: this.config.brave.apiKey }),
      extractor:
        deps.extractor ??
        createFirecrawlExtractor({
          apiKey: this.config.firecrawl.apiKey,
          apiUrl: this.config.firecrawl.apiUrl,
        }),
      deriver:
        deps.deriver ??
        new QueryDeriverAgent(agentDeps, { language: this.config.research.language }),
      synthesizer: deps.synthesizer ?? new ReportSynthesizerAgent(agentDeps),
    };
  }

  /**
   * Build an uninitialized session for a topic
   */
  createSession(topic: string, settings?: Partial<ResearchSettings>): Session {
    return new Session({ topic, settings }, this.deps, {
      defaults: defaultSettings(this.config),
      observability: this.deps.observability,
    });
  }

  /**
   * Initialize and run a session; inspect its status for the outcome
   */
  async run(topic: string, settings?: Partial<ResearchSettings>): Promise<Session> {
    const session = this.createSession(topic, settings);

    if (!this.deps.executor.isReady()) {
      this.deps.observability.log(
        "warn",
        "ANTHROPIC_API_KEY is not set; derivation will use topic-only queries and the report will not be synthesized"
      );
    }

    const initialized = session.initialize();
    if (!initialized.success) {
      this.deps.observability.log("error", "Research session rejected", {
        error: initialized.error.message,
      });
      return session;
    }

    await session.run();
    return session;
  }
}

export function createResearchSystem(
  options?: ResearchSystemOptions,
  deps?: Partial<ResearchDependencies>
): ResearchSystem {
  return new ResearchSystem(options, deps);
}
