import type { Page } from "playwright-core";
import { fillField, isPresent, safeGoto } from "@/sync/browser/helpers";
import { ScrapeError } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import type { SalonBoardCredentials } from "@/sync/types/api";

const log = createChildLogger("salonboard-auth");

export const SELECTORS = {
  username: 'input[name="username"]',
  password: 'input[name="password"]',
  submit: 'button[type="submit"]',
  dashboard: ".dashboard",
} as const;

export function portalUrl(credentials: SalonBoardCredentials, path: string): string {
  return new URL(path, credentials.url.endsWith("/") ? credentials.url : `${credentials.url}/`).toString();
}

/**
 * Login to Salon Board.
 *
 * The login form lives at `/login`; a successful login lands on a page carrying
 * the `.dashboard` container.
 */
export async function loginToSalonBoard(page: Page, credentials: SalonBoardCredentials): Promise<void> {
  log.info("Logging into Salon Board", { url: credentials.url });

  await safeGoto(page, portalUrl(credentials, "login"));
  if (!(await isPresent(page, SELECTORS.username, { timeout: 10_000 }))) {
    throw new ScrapeError("Salon Board login form not found", "layout_changed");
  }

  await fillField(page, SELECTORS.username, credentials.username);
  await fillField(page, SELECTORS.password, credentials.password);
  await page.click(SELECTORS.submit);

  if (!(await isPresent(page, SELECTORS.dashboard, { timeout: 15_000 }))) {
    throw new ScrapeError("Salon Board did not accept the login", "session_expired");
  }

  log.info("Salon Board login successful", { url: page.url() });
}

/** A page still sitting on the login form is a lost session. */
export async function isLoggedIn(page: Page): Promise<boolean> {
  if (page.url() === "about:blank") return false;
  return !(await isPresent(page, SELECTORS.password, { timeout: 1_000 }));
}

export async function ensureLoggedIn(page: Page, credentials: SalonBoardCredentials): Promise<void> {
  if (!(await isLoggedIn(page))) {
    log.info("Session expired or not logged in, authenticating...");
    await loginToSalonBoard(page, credentials);
  }
}
