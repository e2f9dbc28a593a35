import { z } from "zod";
import { checkWebhookSignature } from "./verify.ts";
import type { InboundEvent, WebhookDecodeResult, WebhookRequest } from "./types.ts";

const watchPayloadSchema = z.object({
  repository: z.object({
    name: z.string().min(1),
    stargazers_count: z.number().int().nonnegative(),
  }),
  sender: z.object({
    html_url: z.string().min(1),
  }),
});

function parseJson(body: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(body) };
  } catch {
    return { ok: false };
  }
}

function decodeWatch(payload: unknown): InboundEvent | null {
  const result = watchPayloadSchema.safeParse(payload);
  if (!result.success) {
    return null;
  }

  return {
    kind: "watch",
    repositoryName: result.data.repository.name,
    starCount: result.data.repository.stargazers_count,
    senderProfileUrl: result.data.sender.html_url,
  };
}

/**
 * Authenticate and decode a GitHub webhook delivery.
 *
 * The signature is checked against the raw body before anything is parsed.
 * Deliveries for events other than `watch` are reported as ignored, never
 * as rejected.
 */
export async function decodeWebhook(
  secret: string,
  request: WebhookRequest,
): Promise<WebhookDecodeResult> {
  const eventName = request.eventName ?? "";

  const signature = await checkWebhookSignature(secret, request.body, request.signature);
  if (!signature.valid) {
    return { status: "rejected", eventName, reason: signature.reason };
  }

  const parsed = parseJson(request.body);
  if (!parsed.ok) {
    return { status: "rejected", eventName, reason: "malformed_payload" };
  }

  switch (eventName) {
    case "watch": {
      const event = decodeWatch(parsed.value);
      if (!event) {
        return { status: "rejected", eventName, reason: "malformed_payload" };
      }
      return { status: "matched", event };
    }
    default:
      return { status: "ignored", eventName };
  }
}
