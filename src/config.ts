import { z } from 'zod';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const int = (fallback: number, min: number) => z.coerce.number().int().min(min).default(fallback);

const EnvSchema = z.object({
  PORT: int(3000, 1),
  OPENAI_API_KEY: z.string().trim().min(1).optional(),
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  MAX_CONVERSATION_TURNS: int(10, 1),
  MAX_SIMULATION_RESULTS: int(5, 1),
  MAX_CHAIN_DEPTH: int(3, 0),
  CLASSIFIER_CONFIDENCE_THRESHOLD: z.coerce.number().min(0).max(1).default(0.5),
  EXTERNAL_TIMEOUT_MS: int(30_000, 1),
  STATE_SECRET: z.string().min(1).default('dev-state-secret')
});

export interface AppConfig {
  port: number;
  openaiApiKey: string | undefined;
  openaiModel: string;
  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
  history: { maxConversationTurns: number; maxSimulationResults: number };
  maxChainDepth: number;
  classifierConfidenceThreshold: number;
  externalTimeoutMs: number;
  stateSecret: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // empty strings from .env templates count as unset
  const present = Object.fromEntries(Object.entries(env).filter(([, v]) => v !== undefined && v !== ''));
  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    openaiApiKey: e.OPENAI_API_KEY,
    openaiModel: e.OPENAI_MODEL,
    logLevel: e.LOG_LEVEL,
    history: {
      maxConversationTurns: e.MAX_CONVERSATION_TURNS,
      maxSimulationResults: e.MAX_SIMULATION_RESULTS
    },
    maxChainDepth: e.MAX_CHAIN_DEPTH,
    classifierConfidenceThreshold: e.CLASSIFIER_CONFIDENCE_THRESHOLD,
    externalTimeoutMs: e.EXTERNAL_TIMEOUT_MS,
    stateSecret: e.STATE_SECRET
  };
}
