/**
 * A streamed HTTP response body.
 */
export interface HttpStream {
  /** Value of the content-length header, when the server sent a usable one */
  contentLength?: number;
  /** Next piece of the body, or undefined at end of stream */
  read(): Promise<Uint8Array | undefined>;
  /** Release the connection */
  close(): Promise<void>;
}

/**
 * Opens streamed GET requests.
 * Implementations throw a CLIError with code NETWORK_ERROR when the
 * server does not answer with a 2xx status.
 */
export interface HttpStreamClient {
  open(url: string, signal: AbortSignal): Promise<HttpStream>;
}
