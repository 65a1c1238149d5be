import { parse, serialize } from "cookie";
import signature from "cookie-signature";
import { randomUUID } from "crypto";

export const USER_COOKIE = "user_id";
const COOKIE_MAX_AGE_SECONDS = 30 * 24 * 60 * 60;

export interface Identity {
  userId: string;
  /** false when the id was just issued because no valid cookie came in */
  authenticated: boolean;
  /** Set-Cookie value to send back, present only for a fresh id. */
  setCookie?: string;
}

/** Returns the user id carried by a correctly signed cookie, or null. */
export function readUserId(cookieHeader: string | undefined, secret: string): string | null {
  const raw = parse(cookieHeader ?? "")[USER_COOKIE];
  if (!raw) return null;
  const userId = signature.unsign(raw, secret);
  return userId === false || userId === "" ? null : userId;
}

export function userCookie(userId: string, secret: string): string {
  return serialize(USER_COOKIE, signature.sign(userId, secret), {
    path: "/",
    httpOnly: true,
    sameSite: "lax",
    maxAge: COOKIE_MAX_AGE_SECONDS
  });
}

export function identify(cookieHeader: string | undefined, secret: string): Identity {
  const userId = readUserId(cookieHeader, secret);
  if (userId !== null) return { userId, authenticated: true };

  const fresh = randomUUID();
  return { userId: fresh, authenticated: false, setCookie: userCookie(fresh, secret) };
}
