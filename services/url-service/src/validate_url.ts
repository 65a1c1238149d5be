export type UrlCheck = { ok: true; url: URL } | { ok: false; error: string };

export function validateHttpUrl(s: string, field = "url"): UrlCheck {
  let parsed: URL;
  try {
    parsed = new URL(s);
  } catch {
    return { ok: false, error: `${field} must be a valid URL` };
  }

  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    return { ok: false, error: `${field} must be http/https` };
  }

  return { ok: true, url: parsed };
}
