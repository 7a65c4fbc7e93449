import { makeLogger } from '@beat/logger';

export const logger = makeLogger('run-sim');
