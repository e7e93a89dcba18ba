import { setFetchImpl } from "../src/services/variables/resolve";

/** Answer every content URL request with the given body and status. */
export function stubFetch(body: string, init: ResponseInit = { status: 200 }): string[] {
  const requested: string[] = [];
  setFetchImpl(async (input) => {
    requested.push(String(input));
    return new Response(body, init);
  });
  return requested;
}

export function stubFetchJson(doc: unknown): string[] {
  return stubFetch(JSON.stringify(doc), {
    status: 200,
    headers: { "Content-Type": "application/json" }
  });
}

export function stubFetchError(error: Error): void {
  setFetchImpl(async () => {
    throw error;
  });
}

/** Never answer; the request only ends when its abort signal fires. */
export function stubFetchHang(): void {
  setFetchImpl(
    (_input, init) =>
      new Promise<Response>((_resolve, reject) => {
        const signal = init?.signal;
        if (!signal) {
          reject(new Error("request has no abort signal"));
          return;
        }
        signal.addEventListener("abort", () => reject(signal.reason));
      })
  );
}
