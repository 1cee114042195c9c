/**
 * n8n-launchpad
 *
 * Interactive orchestrator that provisions a managed Kubernetes cluster on
 * AWS, Azure or GCP and deploys n8n onto it with optional TLS and basic auth
 */

export { SessionController } from './session/controller.js';
export type { SessionDependencies, SessionRequest } from './session/controller.js';
export { loadSettings, resolveSettings } from './config/settings.js';
export type { ResolvedSettings } from './config/settings.js';
export { createProvider } from './providers/index.js';
export type { CloudProvider } from './providers/index.js';
export { ExecaProcessRunner } from './lib/process-runner.js';
export type { ProcessRunner, RunOptions, RunResult } from './lib/process-runner.js';
export { PromptsPrompter } from './lib/prompt.js';
export type { Prompter } from './lib/prompt.js';
export { parseArgs } from './cli/args.js';
export type {
  CloudProviderName,
  CloudTarget,
  ConfigurationRecord,
  DatabaseConfig,
  TlsConfig,
  BasicAuthConfig,
  SessionMode,
  ExitCode,
} from './types.js';
export { EXIT_CODES } from './types.js';
