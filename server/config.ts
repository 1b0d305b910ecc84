import path from 'path';

export interface ServerConfig {
  /** Port requested through PORT; null lets the server pick one */
  port: number | null;
  kStorePath: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const port = Number(env.PORT);
  return {
    port: Number.isFinite(port) && port > 0 ? port : null,
    kStorePath: path.resolve(process.cwd(), env.K_STORE_PATH || path.join('storage', 'k_store.json')),
  };
}
