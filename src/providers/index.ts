import type { ResolvedTimeouts } from '../config/settings.js';
import type { ProcessRunner } from '../lib/process-runner.js';
import type { CloudProviderName } from '../types.js';
import { AwsProvider } from './aws.js';
import { AzureProvider } from './azure.js';
import { GcpProvider } from './gcp.js';
import type { CloudProvider } from './types.js';

export function createProvider(name: CloudProviderName, runner: ProcessRunner, timeouts: ResolvedTimeouts): CloudProvider {
  switch (name) {
    case 'aws':
      return new AwsProvider(runner, timeouts);
    case 'azure':
      return new AzureProvider(runner, timeouts);
    case 'gcp':
      return new GcpProvider(runner, timeouts);
  }
}

export { AwsProvider, AzureProvider, GcpProvider };
export type { CloudProvider } from './types.js';
