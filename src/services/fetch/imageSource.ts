import { Readable } from "node:stream";
import { NetworkError, ValidationError, describeError } from "../../errors";

export interface ImageResponse {
  body: Readable;
  contentLength: number | null;
}

/** Remote origin of card images. The signal bounds the whole request, body included. */
export interface ImageSource {
  open(uri: string, signal: AbortSignal): Promise<ImageResponse>;
}

export const parseImageUri = (uri: string): URL => {
  let url: URL;
  try {
    url = new URL(uri);
  } catch (error) {
    throw new ValidationError(`Malformed image URI: ${uri}`, [describeError(error)]);
  }
  if (url.protocol !== "http:" && url.protocol !== "https:") {
    throw new ValidationError(`Unsupported image URI scheme: ${url.protocol}`, [uri]);
  }
  return url;
};

export type FetchFn = (input: URL, init: RequestInit) => Promise<Response>;

export interface HttpImageSourceOptions {
  userAgent: string;
  /** Defaults to the global fetch. */
  fetch?: FetchFn;
}

export class HttpImageSource implements ImageSource {
  private readonly fetch: FetchFn;

  constructor(private readonly options: HttpImageSourceOptions) {
    this.fetch = options.fetch ?? fetch;
  }

  async open(uri: string, signal: AbortSignal): Promise<ImageResponse> {
    const url = parseImageUri(uri);

    let response: Response;
    try {
      response = await this.fetch(url, {
        method: "GET",
        headers: { "User-Agent": this.options.userAgent, Accept: "image/*" },
        signal,
      });
    } catch (error) {
      if (signal.aborted) {
        throw new NetworkError(`Request aborted: ${uri}`, { kind: "aborted", uri }, { cause: error });
      }
      throw new NetworkError(`Connection failed: ${describeError(error)}`, { kind: "connection", uri }, { cause: error });
    }

    if (!response.ok) {
      // Release the connection; an unread body holds it until garbage collection.
      await response.body?.cancel().catch(() => undefined);
      throw new NetworkError(`HTTP ${response.status} ${response.statusText} for ${uri}`, {
        kind: "http",
        status: response.status,
        uri,
      });
    }
    if (!response.body) {
      throw new NetworkError(`Empty response body for ${uri}`, { kind: "connection", uri });
    }

    const length = Number(response.headers.get("content-length"));
    return {
      body: Readable.fromWeb(response.body),
      contentLength: Number.isFinite(length) && length > 0 ? length : null,
    };
  }
}
