/**
 * Docker client for stack deploy/reset operations
 */

import { readdir } from 'node:fs/promises';
import { types } from 'node:util';
import Docker from 'dockerode';
import type { Logger } from 'pino';
import { Failure, Success, type Result } from '../../types/core';

/**
 * Options for building a Docker image.
 */
export interface DockerBuildOptions {
  /** Build context directory */
  context: string;
  /** Path to Dockerfile relative to context */
  dockerfile?: string;
  /** Tag for the built image */
  tag: string;
  /** Build-time variables (Docker ARG values) */
  buildArgs?: Record<string, string>;
}

export interface DockerBuildResult {
  imageId: string;
  tag: string;
}

export interface PruneSummary {
  /** Number of containers or volumes removed */
  removed: number;
  /** Bytes reclaimed */
  spaceReclaimed: number;
}

/**
 * Docker client interface for the operations the stack commands need.
 */
export interface DockerClient {
  buildImage: (options: DockerBuildOptions) => Promise<Result<DockerBuildResult>>;
  stopContainer: (nameOrId: string) => Promise<Result<void>>;
  removeContainer: (nameOrId: string) => Promise<Result<void>>;
  /** IDs of running containers, or of all containers when `all` is set */
  listContainerIds: (options?: { all?: boolean }) => Promise<Result<string[]>>;
  pruneContainers: () => Promise<Result<PruneSummary>>;
  pruneVolumes: () => Promise<Result<PruneSummary>>;
}

interface DockerBuildEvent {
  stream?: string;
  error?: string;
  aux?: { ID?: string };
}

const errorMessage = (error: unknown): string =>
  types.isNativeError(error) ? error.message : 'Unknown error';

/**
 * Create a Docker client
 * @param logger - Logger instance for debug output
 * @param socketPath - Docker daemon socket; dockerode's default when omitted
 */
export const createDockerClient = (logger: Logger, socketPath?: string): DockerClient => {
  const docker = socketPath ? new Docker({ socketPath }) : new Docker();

  return {
    async buildImage(options: DockerBuildOptions): Promise<Result<DockerBuildResult>> {
      try {
        logger.debug({ options }, 'Starting Docker build');

        // dockerode packs the listed entries and applies .dockerignore
        const src = await readdir(options.context);
        const stream = await docker.buildImage({ context: options.context, src }, {
          t: options.tag,
          dockerfile: options.dockerfile,
          buildargs: options.buildArgs,
        });

        const events = await new Promise<DockerBuildEvent[]>((resolve, reject) => {
          docker.modem.followProgress(
            stream,
            (err: Error | null, res: DockerBuildEvent[]) => (err ? reject(err) : resolve(res)),
            (event: DockerBuildEvent) => {
              if (event.stream) {
                logger.debug({ output: event.stream.trimEnd() }, 'Docker build progress');
              }
            },
          );
        });

        const failed = events.find((event) => event.error);
        if (failed?.error) {
          logger.error({ error: failed.error, tag: options.tag }, 'Docker build failed');
          return Failure(`Build failed: ${failed.error}`);
        }

        const imageId = [...events].reverse().find((event) => event.aux?.ID)?.aux?.ID ?? '';
        logger.debug({ imageId, tag: options.tag }, 'Docker build completed successfully');
        return Success({ imageId, tag: options.tag });
      } catch (error) {
        const message = `Build failed: ${errorMessage(error)}`;
        logger.error({ error: message, tag: options.tag }, 'Docker build failed');
        return Failure(message);
      }
    },

    async stopContainer(nameOrId: string): Promise<Result<void>> {
      try {
        await docker.getContainer(nameOrId).stop();
        logger.debug({ container: nameOrId }, 'Container stopped');
        return Success(undefined);
      } catch (error) {
        return Failure(`Failed to stop container ${nameOrId}: ${errorMessage(error)}`);
      }
    },

    async removeContainer(nameOrId: string): Promise<Result<void>> {
      try {
        await docker.getContainer(nameOrId).remove();
        logger.debug({ container: nameOrId }, 'Container removed');
        return Success(undefined);
      } catch (error) {
        return Failure(`Failed to remove container ${nameOrId}: ${errorMessage(error)}`);
      }
    },

    async listContainerIds(options: { all?: boolean } = {}): Promise<Result<string[]>> {
      try {
        const containers = await docker.listContainers({ all: options.all ?? false });
        return Success(containers.map((container) => container.Id));
      } catch (error) {
        return Failure(`Failed to list containers: ${errorMessage(error)}`);
      }
    },

    async pruneContainers(): Promise<Result<PruneSummary>> {
      try {
        const info = await docker.pruneContainers();
        return Success({
          removed: info.ContainersDeleted?.length ?? 0,
          spaceReclaimed: info.SpaceReclaimed ?? 0,
        });
      } catch (error) {
        return Failure(`Failed to prune containers: ${errorMessage(error)}`);
      }
    },

    async pruneVolumes(): Promise<Result<PruneSummary>> {
      try {
        const info = await docker.pruneVolumes();
        return Success({
          removed: info.VolumesDeleted?.length ?? 0,
          spaceReclaimed: info.SpaceReclaimed ?? 0,
        });
      } catch (error) {
        return Failure(`Failed to prune volumes: ${errorMessage(error)}`);
      }
    },
  };
};
