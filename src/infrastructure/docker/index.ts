/**
 * Docker infrastructure - external Docker client interface
 */

export {
  type DockerClient,
  createDockerClient,
  type DockerBuildOptions,
  type DockerBuildResult,
  type PruneSummary,
} from './client';
