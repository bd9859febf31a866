import { createHash, randomBytes, randomInt } from "node:crypto";

/** RFC 7636 の unreserved 文字 */
export const UNRESERVED_CHARACTERS =
  "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789-._~";

export const CODE_VERIFIER_MIN_LENGTH = 43;
export const CODE_VERIFIER_MAX_LENGTH = 128; // exclusive

export type ChallengeEncoding = "hex" | "base64url";

/**
 * code_verifier を生成（長さは [43, 128) から一様に選ぶ）
 */
export function generateCodeVerifier(
  min: number = CODE_VERIFIER_MIN_LENGTH,
  max: number = CODE_VERIFIER_MAX_LENGTH
): string {
  const length = randomInt(min, max);
  let verifier = "";
  for (let i = 0; i < length; i++) {
    verifier += UNRESERVED_CHARACTERS[randomInt(UNRESERVED_CHARACTERS.length)];
  }
  return verifier;
}

/**
 * code_challenge を生成
 * TikTok のデスクトップ向け Login Kit は SHA-256 の hex を要求する
 */
export function generateCodeChallenge(
  verifier: string,
  encoding: ChallengeEncoding = "hex"
): string {
  return createHash("sha256").update(verifier).digest(encoding);
}

/**
 * CSRF 対策の state を生成
 */
export function generateState(): string {
  return randomBytes(16).toString("base64url");
}
