import { verify } from "@octokit/webhooks-methods";

const SIGNATURE_PREFIX = "sha256=";

export type SignatureCheck =
  | { valid: true; reason: null }
  | { valid: false; reason: "missing_signature" | "signature_mismatch" };

/**
 * Check the X-Hub-Signature-256 header against an HMAC-SHA256 of the raw
 * body. @octokit/webhooks-methods does the timing-safe comparison.
 */
export async function checkWebhookSignature(
  secret: string,
  payload: string,
  signature: string | undefined,
): Promise<SignatureCheck> {
  if (!signature) {
    return { valid: false, reason: "missing_signature" };
  }

  // verify() throws on an empty payload or a header without the sha256= prefix
  if (payload.length === 0 || !signature.startsWith(SIGNATURE_PREFIX)) {
    return { valid: false, reason: "signature_mismatch" };
  }

  const matches = await verify(secret, payload, signature);
  return matches ? { valid: true, reason: null } : { valid: false, reason: "signature_mismatch" };
}
