import type { Page } from "playwright-core";

export async function safeGoto(
  page: Page,
  url: string,
  options?: { timeout?: number }
): Promise<void> {
  const timeout = options?.timeout ?? 30_000;
  await page.goto(url, { waitUntil: "domcontentloaded", timeout });
}

/** Resolves true once `selector` is attached, false if it never shows up. */
export async function isPresent(
  page: Page,
  selector: string,
  options?: { timeout?: number }
): Promise<boolean> {
  try {
    await page.waitForSelector(selector, { timeout: options?.timeout ?? 3_000, state: "attached" });
    return true;
  } catch {
    return false;
  }
}

export async function fillField(
  page: Page,
  selector: string,
  value: string
): Promise<void> {
  const element = await page.waitForSelector(selector, { timeout: 10_000, state: "visible" });
  await element.click({ clickCount: 3 });
  await element.fill(value);
}
