/**
 * Simulator configuration management
 */

import { z } from 'zod';
import { ConfigurationError, Interaction, LoggingConfigSchema } from 'multi-page-hmi';

import { STOP_KEYS, describeKey } from './input/keymap.js';

// ============================================================================
// Configuration Schema
// ============================================================================

export const DEMO_NAMES = ['submenu', 'rolling'] as const;

export type DemoName = (typeof DEMO_NAMES)[number];

/** Overrides of the button keys; the stop keys stay reserved */
export const KeymapSchema = z
  .record(z.string().length(1), z.nativeEnum(Interaction))
  .refine((keymap) => Object.keys(keymap).every((key) => !STOP_KEYS.includes(key)), {
    message: `Reserved stop keys cannot be rebound (${STOP_KEYS.map(describeKey).join(', ')})`,
  });

export const SimulatorConfigSchema = z.object({
  tickMs: z.coerce.number().int().min(1).max(60000).default(500),
  startupTicks: z.coerce.number().int().min(0).max(0xffff).default(8),
  shutdownTicks: z.coerce.number().int().min(0).max(0xffff).default(10),
  maxTicks: z.coerce.number().int().positive().optional(),
  demo: z.enum(DEMO_NAMES).default('rolling'),
  keymap: KeymapSchema.default({}),
  logging: LoggingConfigSchema.default({ level: 'warn' }),
});

export type SimulatorConfig = z.infer<typeof SimulatorConfigSchema>;

export type SimulatorConfigInput = z.input<typeof SimulatorConfigSchema>;

function parseConfig(input: unknown): SimulatorConfig {
  const parsed = SimulatorConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid simulator configuration', formatIssues(parsed.error));
  }
  return parsed.data;
}

function parseJsonVariable(name: string, value: string): unknown {
  try {
    return JSON.parse(value);
  } catch (error) {
    throw new ConfigurationError(`Invalid ${name}`, [error instanceof Error ? error.message : String(error)]);
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

// ============================================================================
// Configuration Manager
// ============================================================================

export class ConfigManager {
  private config: SimulatorConfig;

  constructor(initialConfig: SimulatorConfigInput = {}) {
    this.config = parseConfig(initialConfig);
  }

  /**
   * Get the full configuration
   */
  getConfig(): Readonly<SimulatorConfig> {
    return Object.freeze({ ...this.config });
  }

  /**
   * Get a specific configuration section
   */
  get<K extends keyof SimulatorConfig>(key: K): SimulatorConfig[K] {
    return this.config[key];
  }

  /**
   * Update configuration from raw values (e.g. command line options).
   * Rejected updates leave the current configuration in place.
   */
  update(updates: Readonly<Record<string, unknown>>): void {
    this.config = parseConfig({ ...this.config, ...updates });
  }

  /**
   * Validate configuration
   */
  validate(): { valid: boolean; errors: string[] } {
    const parsed = SimulatorConfigSchema.safeParse(this.config);
    return parsed.success ? { valid: true, errors: [] } : { valid: false, errors: formatIssues(parsed.error) };
  }

  /**
   * Load configuration from environment variables
   *
   * HMI_TICK_MS, HMI_DEMO, HMI_MAX_TICKS, HMI_LOG_LEVEL, HMI_LOG_FILE,
   * HMI_LOG_PRETTY and HMI_KEYMAP (JSON, e.g. `{"j":"next"}`); anything unset
   * keeps its default.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): ConfigManager {
    const input: Record<string, unknown> = {};
    const logging: Record<string, unknown> = {};

    if (env.HMI_TICK_MS) input.tickMs = env.HMI_TICK_MS;
    if (env.HMI_DEMO) input.demo = env.HMI_DEMO;
    if (env.HMI_MAX_TICKS) input.maxTicks = env.HMI_MAX_TICKS;
    if (env.HMI_KEYMAP) input.keymap = parseJsonVariable('HMI_KEYMAP', env.HMI_KEYMAP);

    if (env.HMI_LOG_LEVEL) logging.level = env.HMI_LOG_LEVEL;
    if (env.HMI_LOG_FILE) logging.file = env.HMI_LOG_FILE;
    if (env.HMI_LOG_PRETTY) logging.pretty = env.HMI_LOG_PRETTY === 'true';
    if (Object.keys(logging).length > 0) input.logging = logging;

    return new ConfigManager(parseConfig(input));
  }

  /**
   * Export configuration as JSON
   */
  toJSON(): string {
    return JSON.stringify(this.config, null, 2);
  }
}
