import type { Page } from "playwright-core";
import { isPresent, safeGoto } from "@/sync/browser/helpers";
import { ScrapeError } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import type { SalonBoardCredentials } from "@/sync/types/api";
import { portalUrl, SELECTORS } from "../auth";
import type { ReservationRow } from "../types";

const log = createChildLogger("salonboard-reservations");

const LIST_SELECTOR = ".appointment-list";
const ITEM_SELECTOR = ".appointment-item";

/**
 * Read every reservation on the appointment list. Cell text is returned as-is;
 * the normalizer owns parsing.
 */
export async function scrapeReservations(page: Page, credentials: SalonBoardCredentials): Promise<ReservationRow[]> {
  await safeGoto(page, portalUrl(credentials, "appointments"));

  if (!(await isPresent(page, LIST_SELECTOR, { timeout: 15_000 }))) {
    if (await isPresent(page, SELECTORS.password, { timeout: 1_000 })) {
      throw new ScrapeError("Redirected to the login form while reading reservations", "session_expired");
    }
    throw new ScrapeError(`Reservation list (${LIST_SELECTOR}) not found`, "layout_changed");
  }

  const rows = await page.$$eval(ITEM_SELECTOR, (items) =>
    items.map((item) => {
      const cell = (selector: string) => item.querySelector(selector)?.textContent?.trim() ?? null;
      return {
        bookingId: item.getAttribute("data-appointment-id"),
        customerName: cell(".customer-name"),
        serviceName: cell(".service-name"),
        staffName: cell(".staff-name"),
        startTime: cell(".start-time"),
        endTime: cell(".end-time"),
        status: cell(".status"),
        customerPhone: cell(".customer-phone"),
        customerEmail: cell(".customer-email"),
      };
    }),
  );

  log.info("Reservations read", { count: rows.length });
  return rows;
}
