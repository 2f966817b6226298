import { describe, it, expect, vi } from "vitest";
import { NetworkError, ValidationError } from "../../errors";
import { HttpImageSource, type FetchFn } from "../fetch/imageSource";

const trackedStream = (bytes: number[], { complete = true } = {}) => {
  const state = { cancelled: 0 };
  const stream = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.enqueue(new Uint8Array(bytes));
      if (complete) controller.close();
    },
    cancel() {
      state.cancelled++;
    },
  });
  return { stream, state };
};

const sourceWith = (fetchFn: FetchFn) => new HttpImageSource({ userAgent: "card-atlas-test", fetch: fetchFn });

describe("HttpImageSource", () => {
  it("streams a successful response with its length", async () => {
    const { stream } = trackedStream([1, 2, 3]);
    const fetchFn = vi.fn<FetchFn>(async () => new Response(stream, { headers: { "content-length": "3" } }));

    const response = await sourceWith(fetchFn).open("https://img.example.test/a.jpg", new AbortController().signal);
    const chunks: Buffer[] = [];
    for await (const chunk of response.body) chunks.push(Buffer.from(chunk));

    expect(response.contentLength).toBe(3);
    expect([...Buffer.concat(chunks)]).toEqual([1, 2, 3]);
    expect(fetchFn.mock.calls[0][1].headers).toEqual({ "User-Agent": "card-atlas-test", Accept: "image/*" });
  });

  it("releases the body of an error response before failing", async () => {
    const { stream, state } = trackedStream([0], { complete: false });
    const source = sourceWith(async () => new Response(stream, { status: 404, statusText: "Not Found" }));

    const attempt = source.open("https://img.example.test/missing.jpg", new AbortController().signal);

    await expect(attempt).rejects.toBeInstanceOf(NetworkError);
    await expect(attempt).rejects.toMatchObject({ kind: "http", status: 404, retryable: false });
    expect(state.cancelled).toBe(1);
  });

  it("marks server errors as retryable and still releases the body", async () => {
    const { stream, state } = trackedStream([0], { complete: false });
    const source = sourceWith(async () => new Response(stream, { status: 503 }));

    await expect(source.open("https://img.example.test/busy.jpg", new AbortController().signal)).rejects.toMatchObject({
      status: 503,
      retryable: true,
    });
    expect(state.cancelled).toBe(1);
  });

  it("maps transport failures to connection errors", async () => {
    const source = sourceWith(async () => {
      throw new TypeError("fetch failed");
    });

    await expect(source.open("https://img.example.test/a.jpg", new AbortController().signal)).rejects.toMatchObject({
      kind: "connection",
      retryable: true,
    });
  });

  it("rejects non-http URIs without a request", async () => {
    const fetchFn = vi.fn<FetchFn>();
    await expect(sourceWith(fetchFn).open("ftp://img.example.test/a.jpg", new AbortController().signal)).rejects.toBeInstanceOf(
      ValidationError,
    );
    expect(fetchFn).not.toHaveBeenCalled();
  });
});
