import { openAsBlob } from 'node:fs';
import { basename } from 'node:path';
import {
  ActionError,
  RobotApiError,
  RunCreateError,
  TransportError,
  UploadError,
} from '../execution/errors.js';
import { parseActionAck, parseResourceId, parseRunState, type RunState } from './contracts.js';
import {
  ROBOT_VERSION_HEADER,
  endpointUrl,
  type Endpoint,
  type FetchLike,
  type FetchLikeInit,
  type FetchLikeResponse,
} from './types.js';

/** The runner only ever starts runs. */
export type RunActionType = 'play';

export type RobotApiClientOptions = {
  /** Value of the `opentrons-version` header */
  apiVersion: string;
  /** Limit for each request, reading the body included */
  requestTimeoutMs: number;
  fetchFn?: FetchLike;
};

type Reply = {
  response: FetchLikeResponse;
  text: string;
};

/**
 * Request helpers for the robot-server run API.
 *
 * Every call is a single request with no retry: a repeated upload or run
 * creation after an ambiguous failure could leave duplicate runs on the robot.
 */
export class RobotApiClient {
  private readonly apiVersion: string;
  private readonly requestTimeoutMs: number;
  private readonly fetchFn: FetchLike;

  constructor(options: RobotApiClientOptions) {
    this.apiVersion = options.apiVersion;
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  /**
   * Sends one request and reads its body under a single time limit. Failures
   * without a response become TransportError.
   */
  private async send(endpoint: Endpoint, path: string, init: Omit<FetchLikeInit, 'signal'>): Promise<Reply> {
    const method = init.method ?? 'GET';
    try {
      const response = await this.fetchFn(endpointUrl(endpoint, path), {
        ...init,
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
      return { response, text: await response.text() };
    } catch (err) {
      throw new TransportError(method, path, err, this.requestTimeoutMs);
    }
  }

  private headers(json: boolean): Record<string, string> {
    return {
      [ROBOT_VERSION_HEADER]: this.apiVersion,
      ...(json ? { 'content-type': 'application/json' } : {}),
    };
  }

  async uploadProtocol(endpoint: Endpoint, filePath: string): Promise<string> {
    const form = new FormData();
    form.append('files', await openAsBlob(filePath), basename(filePath));

    const { response, text } = await this.send(endpoint, '/protocols', {
      method: 'POST',
      headers: this.headers(false),
      body: form,
    });
    if (!response.ok) {
      throw new UploadError(`Protocol upload failed (${response.status}): ${text}`, text);
    }
    const protocolId = parseResourceId(text);
    if (!protocolId) {
      throw new UploadError(`Protocol upload failed: ${text}`, text);
    }
    return protocolId;
  }

  async createRun(endpoint: Endpoint, protocolId: string): Promise<string> {
    const { response, text } = await this.send(endpoint, '/runs', {
      method: 'POST',
      headers: this.headers(true),
      body: JSON.stringify({ data: { protocolId } }),
    });
    if (!response.ok) {
      throw new RunCreateError(`Run creation failed (${response.status}): ${text}`, text);
    }
    const runId = parseResourceId(text);
    if (!runId) {
      throw new RunCreateError(`Run creation failed: ${text}`, text);
    }
    return runId;
  }

  async postAction(endpoint: Endpoint, runId: string, actionType: RunActionType): Promise<void> {
    const { response, text } = await this.send(endpoint, `/runs/${encodeURIComponent(runId)}/actions`, {
      method: 'POST',
      headers: this.headers(true),
      body: JSON.stringify({ data: { actionType } }),
    });
    if (!response.ok) {
      throw new ActionError(`Run ${actionType} failed (${response.status}): ${text}`, actionType, text);
    }
    if (parseActionAck(text) !== actionType) {
      throw new ActionError(`Run ${actionType} failed: ${text}`, actionType, text);
    }
  }

  async getRunStatus(endpoint: Endpoint, runId: string): Promise<RunState> {
    const { response, text } = await this.send(endpoint, `/runs/${encodeURIComponent(runId)}`, {
      method: 'GET',
      headers: this.headers(false),
    });
    if (!response.ok) {
      throw new RobotApiError(`Run status request failed (${response.status}): ${text}`, response.status, text);
    }
    const state = parseRunState(text);
    if (!state) {
      throw new RobotApiError(`Malformed run status response: ${text}`, response.status, text);
    }
    return state;
  }
}
