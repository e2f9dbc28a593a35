/** A repository was starred (GitHub `watch` event). */
export interface WatchEvent {
  kind: "watch";
  repositoryName: string;
  starCount: number;
  senderProfileUrl: string;
}

/**
 * Every inbound event kind the relay acts on. Supporting another GitHub
 * event means adding a member here and a branch in the decoder.
 */
export type InboundEvent = WatchEvent;

export type WebhookRejectReason =
  | "missing_signature"
  | "signature_mismatch"
  | "malformed_payload";

export type WebhookDecodeResult =
  | { status: "matched"; event: InboundEvent }
  | { status: "ignored"; eventName: string }
  | { status: "rejected"; eventName: string; reason: WebhookRejectReason };

export interface WebhookRequest {
  /** Raw request body, exactly as received */
  body: string;
  /** The X-Hub-Signature-256 header value */
  signature: string | undefined;
  /** The X-GitHub-Event header value */
  eventName: string | undefined;
}
