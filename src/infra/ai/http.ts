import { PipelineAbortedError, type PipelineError } from "../../domain/errors.js";

export interface PostJsonOptions {
  headers?: Record<string, string>;
  signal?: AbortSignal;
  /** Builds the error raised for transport failures and non-2xx responses. */
  fail: (message: string, status?: number, cause?: unknown) => PipelineError;
}

export async function postJson(
  url: string,
  body: unknown,
  options: PostJsonOptions,
): Promise<unknown> {
  let response: Response;
  try {
    response = await fetch(url, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        ...options.headers,
      },
      body: JSON.stringify(body),
      signal: options.signal,
    });
  } catch (error) {
    if (options.signal?.aborted) {
      throw new PipelineAbortedError({ cause: error });
    }
    throw options.fail(`Request to ${url} failed: ${describeCause(error)}`, undefined, error);
  }

  if (!response.ok) {
    let detail: string;
    try {
      detail = await response.text();
    } catch (error) {
      throw readFailure(url, response.status, error, options);
    }
    throw options.fail(`Request to ${url} failed (${response.status}): ${detail}`, response.status);
  }

  try {
    return await response.json();
  } catch (error) {
    if (options.signal?.aborted) {
      throw new PipelineAbortedError({ cause: error });
    }
    throw options.fail(`Response from ${url} is not valid JSON.`, response.status, error);
  }
}

function readFailure(
  url: string,
  status: number,
  error: unknown,
  options: PostJsonOptions,
): PipelineError {
  if (options.signal?.aborted) {
    return new PipelineAbortedError({ cause: error });
  }
  return options.fail(
    `Request to ${url} failed (${status}) and its body could not be read: ${describeCause(error)}`,
    status,
    error,
  );
}

function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
