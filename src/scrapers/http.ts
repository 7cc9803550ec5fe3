import { FetchFailureError, errorMessage } from '../errors';

const USER_AGENT = 'jobsignal/0.1 (+career-page scanner)';

async function request(url: string, accept: string, timeoutMs: number): Promise<Response> {
  let response: Response;
  try {
    response = await fetch(url, {
      headers: { Accept: accept, 'User-Agent': USER_AGENT },
      redirect: 'follow',
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    throw new FetchFailureError(url, `Request to ${url} failed: ${errorMessage(error)}`, { cause: error });
  }

  if (!response.ok) {
    throw new FetchFailureError(url, `HTTP ${response.status} from ${url}`, { status: response.status });
  }
  return response;
}

export async function fetchJson(url: string, timeoutMs: number): Promise<unknown> {
  const response = await request(url, 'application/json', timeoutMs);
  try {
    const body: unknown = await response.json();
    return body;
  } catch (error) {
    throw new FetchFailureError(url, `Invalid JSON from ${url}: ${errorMessage(error)}`, { cause: error });
  }
}

export async function fetchText(url: string, timeoutMs: number): Promise<string> {
  const response = await request(url, 'text/html,application/xhtml+xml', timeoutMs);
  return response.text();
}
