/**
 * Canned fetch for Google Maps client tests
 */

export type FetchMock = jest.Mock<ReturnType<typeof fetch>, Parameters<typeof fetch>>;

export function jsonResponse(body: unknown, status: number = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function createFetchMock(): FetchMock {
  return jest.fn<ReturnType<typeof fetch>, Parameters<typeof fetch>>();
}

/**
 * Query parameters of the nth fetch call (0-based)
 */
export function requestParams(fetchFn: FetchMock, call: number = 0): URLSearchParams {
  return new URL(String(fetchFn.mock.calls[call][0])).searchParams;
}

export function distanceMatrixBody(elementStatus: string, distanceMeters = 0, durationSeconds = 0) {
  return {
    status: 'OK',
    rows: [{
      elements: [
        elementStatus === 'OK'
          ? {
              status: 'OK',
              distance: { value: distanceMeters, text: `${distanceMeters / 1000} km` },
              duration: { value: durationSeconds, text: `${durationSeconds} s` },
            }
          : { status: elementStatus },
      ],
    }],
  };
}

export function geocodeBody(lat: number, lng: number, address: string) {
  return {
    status: 'OK',
    results: [{
      formatted_address: address,
      geometry: { location: { lat, lng } },
    }],
  };
}

/**
 * 200 response whose body never finishes; reading it fails once the
 * request signal aborts
 */
export class StalledBodyResponse extends Response {
  constructor(private readonly abortSignal: AbortSignal | null | undefined) {
    super(null, { status: 200 });
  }

  async json(): Promise<unknown> {
    return new Promise((_resolve, reject) => {
      this.abortSignal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
    });
  }
}
