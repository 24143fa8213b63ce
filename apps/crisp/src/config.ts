import { DEFAULT_MAX_DEPTH } from '@crisp/language';

export interface CrispConfig {
  maxDepth: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CrispConfig {
  const maxDepth = Number(env.CRISP_MAX_DEPTH);
  return {
    maxDepth: Number.isInteger(maxDepth) && maxDepth > 0 ? maxDepth : DEFAULT_MAX_DEPTH,
  };
}
