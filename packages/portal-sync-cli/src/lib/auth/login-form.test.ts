import { describe, it, expect } from "vitest";
import { parseLoginForm, findLoginError } from "./login-form.js";

const PAGE_URL = "https://auth.example.org/realms/demo/protocol/openid-connect/auth?client_id=portal";

const LOGIN_PAGE = `
<html><body>
  <form id="kc-form-login" action="/realms/demo/login-actions/authenticate?session_code=abc" method="post">
    <input type="text" name="username" />
    <input type="password" name="password" />
    <input type="hidden" name="tab_id" value="tab-1" />
    <input type="hidden" name="rememberMe" />
    <input type="hidden" value="orphan" />
  </form>
</body></html>`;

describe("parseLoginForm", () => {
  it("resolves the action and collects named hidden inputs", () => {
    expect(parseLoginForm(LOGIN_PAGE, PAGE_URL)).toEqual({
      action: "https://auth.example.org/realms/demo/login-actions/authenticate?session_code=abc",
      hiddenFields: { tab_id: "tab-1", rememberMe: "" },
    });
  });

  it("falls back to any form with a password field", () => {
    const html = `
      <form action="/search"><input name="q" /></form>
      <form action="https://auth.example.org/custom-login">
        <input type="password" name="password" />
        <input type="hidden" name="execution" value="e-7" />
      </form>`;

    expect(parseLoginForm(html, PAGE_URL)).toEqual({
      action: "https://auth.example.org/custom-login",
      hiddenFields: { execution: "e-7" },
    });
  });

  it("posts back to the page itself when the action is missing", () => {
    const html = `<form id="kc-form-login"><input type="password" name="password" /></form>`;

    expect(parseLoginForm(html, PAGE_URL)?.action).toBe(PAGE_URL);
  });

  it("returns null when the page has no login form", () => {
    expect(parseLoginForm("<html><body><a href='data/'>data/</a></body></html>", PAGE_URL)).toBeNull();
  });
});

describe("findLoginError", () => {
  it("returns the alert title text", () => {
    const html = `
      <div class="pf-c-alert pf-m-danger">
        <span class="pf-c-alert__title kc-feedback-text">  Invalid username or password.  </span>
      </div>`;

    expect(findLoginError(html)).toBe("Invalid username or password.");
  });

  it("reports a generic message when only the marker class is present", () => {
    expect(findLoginError(`<div class="kc-feedback-text"></div>`)).toBe(
      "Login page reported an error"
    );
  });

  it("returns null for a page without error markers", () => {
    expect(findLoginError("<html><body>Index of /files</body></html>")).toBeNull();
  });
});
