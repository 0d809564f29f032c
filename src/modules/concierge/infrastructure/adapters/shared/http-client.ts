/**
 * Fetches a URL with timeout support using AbortController.
 *
 * @param timeoutMs - Aborts the request after this many milliseconds
 * @throws Error with name 'AbortError' if timeout occurs
 */
export async function fetchWithTimeout(
  url: string,
  options: RequestInit,
  timeoutMs: number,
): Promise<Response> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await fetch(url, {
      ...options,
      signal: controller.signal,
    });
  } finally {
    clearTimeout(timeoutId);
  }
}

/** Body as JSON; `{}` when empty and `{ raw }` when it is not JSON. */
export async function parseJson(response: Response): Promise<unknown> {
  const text = await response.text();

  if (text.trim() === '') {
    return {};
  }

  try {
    return JSON.parse(text) as unknown;
  } catch {
    return { raw: text };
  }
}
