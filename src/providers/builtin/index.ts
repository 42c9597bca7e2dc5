import type { ProviderRegistration } from '../types.js';
import { createDockerProvider } from './docker.js';
import { createGitProvider } from './git.js';
import { createOpenAIProvider } from './openai.js';
import { createPytestProvider } from './pytest.js';

/** Startup registration table. Order is selection priority within a capability. */
export const BUILTIN_PROVIDERS: readonly ProviderRegistration[] = [
  { name: 'git', capabilities: ['version-control'], create: createGitProvider },
  { name: 'docker', capabilities: ['container'], create: createDockerProvider },
  { name: 'pytest', capabilities: ['test-runner'], create: createPytestProvider },
  { name: 'openai', capabilities: ['ai'], create: createOpenAIProvider },
];

export { GitProvider } from './git.js';
export { DockerProvider } from './docker.js';
export { PytestProvider, parseTestSummary } from './pytest.js';
export { OpenAIProvider } from './openai.js';
