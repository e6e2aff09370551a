/**
 * Process configuration: defaults, overridden by environment, overridden by flags.
 */

import { parseArgs } from 'node:util';
import { z } from 'zod';
import type { AssignmentConfig } from './core/DispatchPolicy.js';
import type { OrchestratorConfig } from './core/Orchestrator.js';
import { InvalidConfigError, errorMessage } from './errors.js';

export const DEFAULT_CONFIG = {
  romPath: 'roms/game.gb',
  layoutPath: null as string | null,
  host: '0.0.0.0',
  port: 5000,
  assignment: {
    playerAgentId: 'grok',
    battleAgentId: 'claude',
    dispatchMode: 'dual',
  } satisfies AssignmentConfig,
  orchestrator: {
    frameQuantum: 2,
    extractEvery: 15,
    screenshotEvery: 30,
    tickIntervalMs: 33,
    decisionTimeoutMs: 30_000,
    sendScreenshotToAgents: true,
  } satisfies Required<OrchestratorConfig>,
  seed: 1,
  autostart: false,
  anthropicModel: 'claude-sonnet-4-5-20250929',
  xaiModel: 'grok-4-1-fast-reasoning',
};

const PositiveInt = z.coerce.number().int().min(1);

const AppConfigSchema = z.object({
  romPath: z.string().min(1),
  layoutPath: z.string().min(1).nullable(),
  host: z.string().min(1),
  port: z.coerce.number().int().min(0).max(65535),
  assignment: z.object({
    playerAgentId: z.string().min(1),
    battleAgentId: z.string().min(1),
    dispatchMode: z.enum(['single', 'dual']),
  }),
  orchestrator: z.object({
    frameQuantum: PositiveInt,
    extractEvery: PositiveInt,
    screenshotEvery: PositiveInt,
    tickIntervalMs: z.coerce.number().int().min(0),
    decisionTimeoutMs: PositiveInt,
    sendScreenshotToAgents: z.boolean(),
  }),
  seed: z.coerce.number().int(),
  autostart: z.boolean(),
  anthropic: z.object({ apiKey: z.string().min(1).optional(), model: z.string().min(1) }),
  xai: z.object({ apiKey: z.string().min(1).optional(), model: z.string().min(1) }),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export const USAGE = `Usage: cartridge-pilot [options]

  --rom <path>                 ROM image (env ROM_PATH, default ${DEFAULT_CONFIG.romPath})
  --layout <path>              memory layout JSON; without it state is a fixed placeholder
  --host <addr>                listen address (default ${DEFAULT_CONFIG.host})
  --port <n>                   HTTP/WebSocket port (env PORT, default ${DEFAULT_CONFIG.port})
  --player <id>                agent exploring the world (default ${DEFAULT_CONFIG.assignment.playerAgentId})
  --battle <id>                agent fighting battles (default ${DEFAULT_CONFIG.assignment.battleAgentId})
  --mode <single|dual>         dispatch mode (default ${DEFAULT_CONFIG.assignment.dispatchMode})
  --frame-quantum <n>          frames per idle iteration
  --extract-every <n>          iterations between state extractions
  --screenshot-every <n>       iterations between frame broadcasts
  --tick-ms <n>                pause between iterations
  --decision-timeout-ms <n>    agent deadline
  --seed <n>                   scripted agent seed
  --autostart                  start the session immediately
  --anthropic-model <name>     model for the claude agent
  --xai-model <name>           model for the grok agent
  --no-screenshots-to-agents   send state only, no frames
  --help                       show this text
`;

export interface LoadedConfig {
  config: AppConfig;
  help: boolean;
}

function parseFlags(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      rom: { type: 'string' },
      layout: { type: 'string' },
      host: { type: 'string' },
      port: { type: 'string' },
      player: { type: 'string' },
      battle: { type: 'string' },
      mode: { type: 'string' },
      'frame-quantum': { type: 'string' },
      'extract-every': { type: 'string' },
      'screenshot-every': { type: 'string' },
      'tick-ms': { type: 'string' },
      'decision-timeout-ms': { type: 'string' },
      seed: { type: 'string' },
      autostart: { type: 'boolean', default: false },
      'anthropic-model': { type: 'string' },
      'xai-model': { type: 'string' },
      'no-screenshots-to-agents': { type: 'boolean', default: false },
      help: { type: 'boolean', default: false },
    },
    strict: true,
  }).values;
}

export function loadConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): LoadedConfig {
  let values: ReturnType<typeof parseFlags>;
  try {
    values = parseFlags(argv);
  } catch (e) {
    throw new InvalidConfigError(errorMessage(e));
  }

  const d = DEFAULT_CONFIG;
  const candidate = {
    romPath: values.rom ?? env.ROM_PATH ?? d.romPath,
    layoutPath: values.layout ?? d.layoutPath,
    host: values.host ?? d.host,
    port: values.port ?? env.PORT ?? d.port,
    assignment: {
      playerAgentId: values.player ?? d.assignment.playerAgentId,
      battleAgentId: values.battle ?? d.assignment.battleAgentId,
      dispatchMode: values.mode ?? d.assignment.dispatchMode,
    },
    orchestrator: {
      frameQuantum: values['frame-quantum'] ?? d.orchestrator.frameQuantum,
      extractEvery: values['extract-every'] ?? d.orchestrator.extractEvery,
      screenshotEvery: values['screenshot-every'] ?? d.orchestrator.screenshotEvery,
      tickIntervalMs: values['tick-ms'] ?? d.orchestrator.tickIntervalMs,
      decisionTimeoutMs: values['decision-timeout-ms'] ?? d.orchestrator.decisionTimeoutMs,
      sendScreenshotToAgents: !values['no-screenshots-to-agents'],
    },
    seed: values.seed ?? d.seed,
    autostart: values.autostart ?? d.autostart,
    anthropic: { apiKey: env.ANTHROPIC_API_KEY || undefined, model: values['anthropic-model'] ?? d.anthropicModel },
    xai: { apiKey: env.XAI_API_KEY || undefined, model: values['xai-model'] ?? d.xaiModel },
  };

  const parsed = AppConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new InvalidConfigError(`Invalid configuration: ${issues.join('; ')}`);
  }
  return { config: parsed.data, help: values.help ?? false };
}
