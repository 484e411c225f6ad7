/**
 * Reachable address of the robot-server. Resolved once per invocation.
 */
export type Endpoint = {
  readonly host: string;
  readonly port: number;
};

export type FetchLikeResponse = {
  ok: boolean;
  status: number;
  text: () => Promise<string>;
};

export type FetchLikeInit = {
  method?: string;
  headers?: Record<string, string>;
  body?: string | FormData;
  signal?: AbortSignal;
};

export type FetchLike = (input: string, init?: FetchLikeInit) => Promise<FetchLikeResponse>;

export const ROBOT_VERSION_HEADER = 'opentrons-version';

export function endpointUrl(endpoint: Endpoint, path: string): string {
  return `http://${endpoint.host}:${endpoint.port}${path}`;
}
