/**
 * HTTP client for the edgepull control plane.
 * Returns a result object instead of throwing on HTTP errors.
 */

/** Standard response shape from the API */
export interface ApiResponse<T = unknown> {
  ok: boolean;
  status: number;
  data?: T;
  error?: string;
}

function errorText(data: unknown): string | undefined {
  if (typeof data !== 'object' || data === null) return undefined;
  if ('message' in data && typeof data.message === 'string') return data.message;
  if ('error' in data && typeof data.error === 'string') return data.error;
  return undefined;
}

/**
 * Make a request to the control plane. Returns parsed JSON.
 * Network failures are thrown.
 */
export async function apiRequest<T = unknown>(
  baseUrl: string,
  method: string,
  urlPath: string,
  body?: unknown,
): Promise<ApiResponse<T>> {
  const url = `${baseUrl}${urlPath.startsWith('/') ? urlPath : '/' + urlPath}`;

  const fetchOptions: RequestInit = { method };

  if (body !== undefined && method !== 'GET') {
    fetchOptions.headers = { 'Content-Type': 'application/json' };
    fetchOptions.body = JSON.stringify(body);
  }

  const response = await fetch(url, fetchOptions);

  let data: unknown;
  try {
    data = await response.json();
  } catch {
    // Response may not be JSON
  }

  if (!response.ok) {
    return {
      ok: false,
      status: response.status,
      error: errorText(data) ?? `HTTP ${response.status}`,
    };
  }

  return {
    ok: true,
    status: response.status,
    data: data as T,
  };
}
