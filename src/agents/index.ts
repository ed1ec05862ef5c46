import type { AgentSettings } from '../config/settings.js';
import type { AgentRunner } from '../types/index.js';
import { CliAgentRunner } from './cli-runner.js';
import { SdkAgentRunner } from './sdk-runner.js';

export { CliAgentRunner, buildAgentArgs } from './cli-runner.js';
export { SdkAgentRunner } from './sdk-runner.js';

export function createAgentRunner(agent: AgentSettings): AgentRunner {
  switch (agent.runner) {
    case 'cli':
      return new CliAgentRunner({ command: agent.command, args: agent.args });
    case 'sdk':
      return new SdkAgentRunner({ model: agent.model });
  }
}
