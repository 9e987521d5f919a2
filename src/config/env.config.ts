export interface EnvConfig {
  API_BASE_URL: string;
  WS_URL: string;
  HTTP_TIMEOUT_MS: number;
  AUTH_REFRESH_PATH: string;
  HEARTBEAT_INTERVAL_MS: number;
  RECONNECT_DELAY_MS: number;
  MAX_RECONNECT_ATTEMPTS: number;
  ACCESS_TOKEN: string;
  REFRESH_TOKEN: string;
}

export default (): EnvConfig => ({
  API_BASE_URL: process.env.API_BASE_URL ?? 'http://localhost:8080/api/v1',
  WS_URL: process.env.WS_URL ?? 'ws://localhost:8080/ws',
  HTTP_TIMEOUT_MS: parseInt(process.env.HTTP_TIMEOUT_MS ?? '30000', 10),
  AUTH_REFRESH_PATH: process.env.AUTH_REFRESH_PATH ?? '/auth/refresh',
  HEARTBEAT_INTERVAL_MS: parseInt(process.env.HEARTBEAT_INTERVAL_MS ?? '30000', 10),
  RECONNECT_DELAY_MS: parseInt(process.env.RECONNECT_DELAY_MS ?? '5000', 10),
  MAX_RECONNECT_ATTEMPTS: parseInt(process.env.MAX_RECONNECT_ATTEMPTS ?? '5', 10),
  ACCESS_TOKEN: process.env.ACCESS_TOKEN ?? '',
  REFRESH_TOKEN: process.env.REFRESH_TOKEN ?? '',
});
