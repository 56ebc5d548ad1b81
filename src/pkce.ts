import { createHash, randomBytes } from "node:crypto";

const VERIFIER_BYTES = 96;
const VERIFIER_MAX_LENGTH = 128;

export interface PkcePair {
  verifier: string;
  challenge: string;
  method: "S256";
}

export function generateCodeVerifier(): string {
  return randomBytes(VERIFIER_BYTES).toString("base64url").slice(0, VERIFIER_MAX_LENGTH);
}

export function deriveCodeChallenge(verifier: string): string {
  return createHash("sha256").update(verifier).digest("base64url").replace(/=+$/, "");
}

export function createPkcePair(): PkcePair {
  const verifier = generateCodeVerifier();
  return { verifier, challenge: deriveCodeChallenge(verifier), method: "S256" };
}

export function buildAuthorizationUrl({
  authorizeUrl,
  clientId,
  redirectUri,
  scopes,
  pkce
}: {
  authorizeUrl: string;
  clientId: string;
  redirectUri: string;
  scopes: string[];
  pkce: PkcePair;
}): string {
  const url = new URL(authorizeUrl);
  url.searchParams.set("client_id", clientId);
  url.searchParams.set("redirect_uri", redirectUri);
  url.searchParams.set("response_type", "code");
  url.searchParams.set("scope", scopes.join(" "));
  url.searchParams.set("code_challenge", pkce.challenge);
  url.searchParams.set("code_challenge_method", pkce.method);
  return url.toString();
}
