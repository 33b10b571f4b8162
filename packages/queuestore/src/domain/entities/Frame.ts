export const MESSAGE_ID_HEADER = "message-id";

export type FrameBody = string | Uint8Array;
export type FrameHeaders =
  | Record<string, string>
  | Map<string, string>
  | Array<[string, string]>;

export class Frame {
  readonly headers: Map<string, string>;

  constructor(headers: FrameHeaders = {}, public body: FrameBody = "") {
    this.headers = new Map(
      headers instanceof Map || Array.isArray(headers)
        ? headers
        : Object.entries(headers)
    );
  }

  // an empty header value is treated as no id at all
  get messageId(): string | undefined {
    return this.headers.get(MESSAGE_ID_HEADER) || undefined;
  }
}
