import Browserbase from "@browserbasehq/sdk";
import { chromium, type Browser, type BrowserContext, type Page } from "playwright-core";
import { getEnv } from "@/sync/config/env";
import { ScrapeError } from "@/sync/errors";
import { createChildLogger, errorMessage } from "@/sync/logger";

const log = createChildLogger("browser-session");

export interface BrowserSession {
  browser: Browser;
  context: BrowserContext;
  page: Page;
  sessionId: string;
}

export interface BrowserbaseConfig {
  apiKey: string;
  projectId: string;
}

export function browserbaseConfigFromEnv(): BrowserbaseConfig {
  const env = getEnv();
  if (!env.BROWSERBASE_API_KEY || !env.BROWSERBASE_PROJECT_ID) {
    throw new ScrapeError("BROWSERBASE_API_KEY and BROWSERBASE_PROJECT_ID must be set to scrape Salon Board");
  }
  return { apiKey: env.BROWSERBASE_API_KEY, projectId: env.BROWSERBASE_PROJECT_ID };
}

export async function createBrowserSession(config: BrowserbaseConfig = browserbaseConfigFromEnv()): Promise<BrowserSession> {
  const bb = new Browserbase({ apiKey: config.apiKey });

  log.info("Creating Browserbase session...");
  let session: Awaited<ReturnType<typeof bb.sessions.create>>;
  try {
    session = await bb.sessions.create({ projectId: config.projectId, keepAlive: false });
  } catch (error) {
    throw new ScrapeError(`Could not start a remote browser: ${errorMessage(error)}`, "network");
  }

  log.info("Connecting Playwright to session", { sessionId: session.id });
  const browser = await chromium.connectOverCDP(session.connectUrl);
  const context = browser.contexts()[0] ?? (await browser.newContext());
  const page = context.pages()[0] ?? (await context.newPage());

  log.info("Browser session ready", { sessionId: session.id });
  return { browser, context, page, sessionId: session.id };
}

export async function closeBrowserSession(session: BrowserSession): Promise<void> {
  log.info("Closing browser session", { sessionId: session.sessionId });
  try {
    await session.page.close();
    await session.browser.close();
    log.info("Browser session closed", { sessionId: session.sessionId });
  } catch (error) {
    log.warn("Error closing browser session", {
      sessionId: session.sessionId,
      error: errorMessage(error),
    });
  }
}
