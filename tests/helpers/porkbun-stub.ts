/**
 * In-process stand-in for the Porkbun API.
 *
 * Plugs into axios as an adapter, so requests never leave the process.
 * Replies are consumed in order; an Error reply simulates a transport failure.
 */

import type { AxiosAdapter, AxiosResponse } from 'axios';

export type StubReply = { status?: number; data: unknown } | Error;

export interface RecordedCall {
  method?: string;
  url?: string;
  body: Record<string, unknown>;
}

export function createPorkbunStub(replies: StubReply[]) {
  const queue = [...replies];
  const calls: RecordedCall[] = [];

  const adapter: AxiosAdapter = async (config) => {
    calls.push({
      method: config.method,
      url: config.url,
      body: typeof config.data === 'string' ? JSON.parse(config.data) : {},
    });

    const reply = queue.shift();
    if (reply === undefined) {
      throw new Error(`No stub reply queued for ${config.url}`);
    }
    if (reply instanceof Error) {
      throw reply;
    }

    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status ?? 200,
      statusText: '',
      headers: {},
      config,
    };
    return response;
  };

  return { adapter, calls };
}

export function success(fields: Record<string, unknown> = {}): StubReply {
  return { data: { status: 'SUCCESS', ...fields } };
}
