import { err, ok, type Result } from '../lib/errors.js';
import { CLOUD_PROVIDERS, type CloudProviderName, type SessionMode } from '../types.js';

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'version' }
  | { kind: 'run'; mode: SessionMode; cloud?: CloudProviderName; verbose: boolean };

const MODE_FLAGS: Record<string, SessionMode> = {
  '--teardown': 'teardown',
  '--skip-infra': 'skip-infra',
  '--skip-terraform': 'skip-infra',
  '--update-tls': 'update-tls',
  '--list-states': 'list-states',
};

function isCloud(value: string): value is CloudProviderName {
  return CLOUD_PROVIDERS.some((cloud) => cloud === value);
}

/**
 * Parse `process.argv.slice(2)`. Mode flags are mutually exclusive;
 * without one the run is a full deploy.
 */
export function parseArgs(argv: string[]): Result<CliCommand, string> {
  let mode: SessionMode | null = null;
  let modeFlag = '';
  let cloud: CloudProviderName | undefined;
  let verbose = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '--help' || arg === '-h') {
      return ok({ kind: 'help' } as const);
    }
    if (arg === '--version' || arg === '-v') {
      return ok({ kind: 'version' } as const);
    }
    if (arg === '--verbose') {
      verbose = true;
      continue;
    }

    if (arg === '--cloud' || arg.startsWith('--cloud=')) {
      const value = arg === '--cloud' ? argv[++i] : arg.slice('--cloud='.length);
      if (value === undefined || !isCloud(value)) {
        return err(`--cloud must be one of ${CLOUD_PROVIDERS.join(', ')}`);
      }
      cloud = value;
      continue;
    }

    const flagMode = MODE_FLAGS[arg];
    if (flagMode === undefined) {
      return err(`Unknown option: ${arg}`);
    }
    if (mode !== null && mode !== flagMode) {
      return err(`${modeFlag} and ${arg} cannot be combined`);
    }
    mode = flagMode;
    modeFlag = arg;
  }

  const command: CliCommand = { kind: 'run', mode: mode ?? 'deploy', cloud, verbose };
  return ok(command);
}
