import * as cheerio from "cheerio";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface LoginForm {
  /** Absolute URL the credentials are posted to */
  action: string;
  /** Every named hidden input, in document order */
  hiddenFields: Record<string, string>;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const LOGIN_FORM_SELECTOR = "form#kc-form-login";

/** Class names the realm's login theme puts on failure messages */
const ERROR_MARKERS = ["kc-feedback-text", "pf-c-alert__title"];

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Find the realm's login form on a page.
 * Falls back to the first form with a password field for customised themes.
 * Returns null when the page has no login form (already signed in).
 */
export function parseLoginForm(html: string, pageUrl: string): LoginForm | null {
  const $ = cheerio.load(html);

  let form = $(LOGIN_FORM_SELECTOR).first();
  if (form.length === 0) {
    form = $("form")
      .filter((_, element) => $(element).find("input[type=password]").length > 0)
      .first();
  }
  if (form.length === 0) {
    return null;
  }

  const hiddenFields: Record<string, string> = {};
  form.find("input[type=hidden]").each((_, element) => {
    const name = $(element).attr("name");
    if (name) {
      hiddenFields[name] = $(element).attr("value") ?? "";
    }
  });

  const rawAction = form.attr("action");
  const action = rawAction ? new URL(rawAction, pageUrl).toString() : pageUrl;

  return { action, hiddenFields };
}

/**
 * Detect a failed login on the page returned after posting credentials.
 * Returns the alert text when one is shown, a generic message when only
 * the marker is present, and null on success.
 */
export function findLoginError(html: string): string | null {
  if (!ERROR_MARKERS.some((marker) => html.includes(marker))) {
    return null;
  }

  const $ = cheerio.load(html);
  const alert = $("span.pf-c-alert__title").first().text().trim()
    || $("#input-error").first().text().trim()
    || $(".kc-feedback-text").first().text().trim();

  return alert || "Login page reported an error";
}
