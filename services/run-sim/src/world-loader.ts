import { readFile } from 'node:fs/promises';
import path from 'node:path';

import { parseWorld, type WorldT } from '@beat/runner-spec';

export class WorldLoadError extends Error {
  constructor(
    readonly worldPath: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(`${message}: ${worldPath}`, options);
    this.name = 'WorldLoadError';
  }
}

export async function loadWorld(worldPath: string): Promise<WorldT> {
  const resolved = path.resolve(worldPath);

  let raw: string;
  try {
    raw = await readFile(resolved, 'utf8');
  } catch (error) {
    throw new WorldLoadError(resolved, 'Cannot read world file', { cause: error });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new WorldLoadError(resolved, 'World file is not valid JSON', { cause: error });
  }

  try {
    return parseWorld(json);
  } catch (error) {
    throw new WorldLoadError(resolved, 'World file does not match the world schema', { cause: error });
  }
}
