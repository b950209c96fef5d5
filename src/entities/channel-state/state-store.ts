/**
 * File-backed state store
 *
 * The whole map is read once at startup and rewritten after each cycle
 * that changed something. Writes go to a temp file in the same directory
 * which is flushed and then renamed over the target, so the previous file
 * stays readable until the new one is complete.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { createLogger, errorMessage } from '../../shared/lib';
import { channelStateMapSchema, type ChannelStateMap } from './types';

const log = createLogger('State');

function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Serialize state with sorted keys so diffs of the file stay stable
 */
export function serializeState(state: ChannelStateMap): string {
  const sorted: ChannelStateMap = {};
  for (const login of Object.keys(state).sort()) {
    sorted[login] = state[login];
  }
  return `${JSON.stringify(sorted, null, 2)}\n`;
}

/**
 * Create a state store for the given file path
 */
export function createStateStore(filePath: string) {
  const resolvedPath = path.resolve(filePath);

  return {
    /**
     * Absolute path of the state file
     */
    getPath(): string {
      return resolvedPath;
    },

    /**
     * Read the state file. Returns an empty map on first run or when the
     * file cannot be parsed.
     */
    async load(): Promise<ChannelStateMap> {
      let raw: string;
      try {
        raw = await fs.readFile(resolvedPath, 'utf-8');
      } catch (error) {
        if (isNotFound(error)) {
          log.info(`No state file at ${resolvedPath}, starting fresh`);
          return {};
        }
        throw error;
      }

      let parsed: unknown;
      try {
        parsed = JSON.parse(raw);
      } catch (error) {
        log.warn(`Could not parse state file ${resolvedPath}: ${errorMessage(error)}`);
        return {};
      }

      const result = channelStateMapSchema.safeParse(parsed);
      if (!result.success) {
        log.warn(`Ignoring malformed state file ${resolvedPath}: ${result.error.issues[0]?.message}`);
        return {};
      }

      log.info(`Loaded state for ${Object.keys(result.data).length} channel(s)`);
      return result.data;
    },

    /**
     * Atomically replace the state file
     */
    async save(state: ChannelStateMap): Promise<void> {
      const dir = path.dirname(resolvedPath);
      const tmpPath = `${resolvedPath}.${process.pid}.tmp`;

      await fs.mkdir(dir, { recursive: true });

      try {
        const handle = await fs.open(tmpPath, 'w');
        try {
          await handle.writeFile(serializeState(state), 'utf-8');
          await handle.sync();
        } finally {
          await handle.close();
        }
        await fs.rename(tmpPath, resolvedPath);
      } catch (error) {
        await fs.rm(tmpPath, { force: true });
        throw error;
      }

      log.debug(`Saved state for ${Object.keys(state).length} channel(s)`);
    },
  };
}

/**
 * Type for the state store
 */
export type StateStore = ReturnType<typeof createStateStore>;
