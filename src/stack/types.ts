import type { Logger } from 'pino';
import type { CommandExecutor } from '../infrastructure/command-executor';
import type { DockerClient } from '../infrastructure/docker/client';

export interface StackStep {
  name: string;
  ok: boolean;
  skipped?: boolean;
  detail?: string;
}

export interface StackReport {
  ok: boolean;
  steps: StackStep[];
  warnings: string[];
}

export type StackExecutor = Pick<CommandExecutor, 'execute' | 'run' | 'isAvailable'>;

export interface StackDeps {
  executor: StackExecutor;
  docker: DockerClient;
  logger: Logger;
}
