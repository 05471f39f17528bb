/**
 * Shared POST helper for provider APIs: timeout via AbortController and
 * translation of failures into the orchestrator's error taxonomy.
 */

import { z } from 'zod';
import type { ProviderName } from '../../types/pipeline.js';
import { createTimeoutAbortController, isTransientStatus } from '../../../services/shared/robustUtils.js';
import { providerLogger } from '../../../services/logger.js';
import { errorMessage, ProviderRejectedError, TransientProviderError } from '../pipeline/errors.js';
import type { DispatchReceipt } from './types.js';

export type FetchLike = typeof fetch;

export interface PostJsonOptions {
  provider: ProviderName;
  url: string;
  headers: Record<string, string>;
  body: unknown;
  timeoutMs: number;
  fetchImpl?: FetchLike;
}

/**
 * Maps an HTTP status to the matching error class.
 * Exported for tests.
 */
export function mapStatusToError(
  provider: ProviderName,
  status: number,
  endpoint: string,
  detail?: string
): TransientProviderError | ProviderRejectedError {
  const message = `${provider} ${endpoint} responded ${status}${detail ? `: ${detail}` : ''}`;
  return isTransientStatus(status)
    ? new TransientProviderError(provider, message, status)
    : new ProviderRejectedError(provider, message, status);
}

export async function postJson(options: PostJsonOptions): Promise<unknown> {
  const { provider, url, headers, body, timeoutMs } = options;
  const fetchImpl = options.fetchImpl ?? fetch;
  const endpoint = new URL(url).pathname;
  const { signal, cleanup } = createTimeoutAbortController(timeoutMs);

  let response: Response;
  try {
    response = await fetchImpl(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', ...headers },
      body: JSON.stringify(body),
      signal,
    });
  } catch (error) {
    // Network failure or our own timeout; the provider may never have seen it
    throw new TransientProviderError(provider, `${provider} ${endpoint} unreachable: ${errorMessage(error)}`);
  } finally {
    cleanup();
  }

  const text = await response.text();
  if (!response.ok) {
    providerLogger.warn(`${provider} ${endpoint} failed`, { status: response.status, body: text.slice(0, 500) });
    throw mapStatusToError(provider, response.status, endpoint, text.slice(0, 200));
  }

  if (text.length === 0) return {};
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    // Some endpoints acknowledge with a bare string
    return { message: text };
  }
}

const receiptSchema = z
  .object({
    job_id: z.string().optional(),
    task_id: z.string().optional(),
    id: z.string().optional(),
    data: z.object({ task_id: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

/**
 * Pull the provider's own job id out of an acceptance response, if it sent one.
 */
export function extractReceipt(payload: unknown): DispatchReceipt {
  const parsed = receiptSchema.safeParse(payload);
  if (!parsed.success) return {};
  const { job_id, task_id, id, data } = parsed.data;
  const providerJobId = job_id ?? task_id ?? data?.task_id ?? id;
  return providerJobId ? { providerJobId } : {};
}
