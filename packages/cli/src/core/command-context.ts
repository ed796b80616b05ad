/**
 * Command Context - Lazy service creation
 *
 * This is NOT a framework - just an object that knows how to create the
 * services a handler needs. Removes service instantiation from command files.
 */

import type { SweepConfig, SweepJournalPort } from '@perfsweep/core';
import { createProductionSweepContext, type SweepContext } from '@perfsweep/workflows';
import { ResultsWriter } from './results-writer.js';

export type SweepContextFactory = (config: SweepConfig, journal?: SweepJournalPort) => SweepContext;

/**
 * Services available in command context
 */
export interface CommandServices {
  sweepContext: SweepContextFactory;
  resultsWriter(): ResultsWriter;
}

/**
 * Options for creating a CommandContext with service overrides (tests)
 */
export interface CommandContextOptions {
  /**
   * Replace the production sweep context (build/measure/sink ports)
   */
  sweepContextOverride?: SweepContextFactory;
  resultsWriterOverride?: () => ResultsWriter;
  /**
   * Environment used for defaults (defaults to process.env)
   */
  env?: NodeJS.ProcessEnv;
}

export class CommandContext {
  private _services: CommandServices | null = null;
  private readonly _options: CommandContextOptions;

  constructor(options: CommandContextOptions = {}) {
    this._options = options;
  }

  get env(): NodeJS.ProcessEnv {
    return this._options.env ?? process.env;
  }

  get services(): CommandServices {
    if (!this._services) {
      this._services = this._createServices();
    }
    return this._services;
  }

  private _createServices(): CommandServices {
    return {
      sweepContext: (config, journal) =>
        this._options.sweepContextOverride?.(config, journal) ??
        createProductionSweepContext(config, { journal }),
      resultsWriter: () => this._options.resultsWriterOverride?.() ?? new ResultsWriter(),
    };
  }
}
