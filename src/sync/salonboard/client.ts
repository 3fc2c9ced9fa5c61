import { closeBrowserSession, createBrowserSession, type BrowserSession } from "@/sync/browser/session";
import { ScrapeError } from "@/sync/errors";
import { createChildLogger, errorMessage } from "@/sync/logger";
import type { SalonBoardCredentials } from "@/sync/types/api";
import type { DateRange, PortalAppointment, PortalSource } from "@/sync/types";
import { ensureLoggedIn } from "./auth";
import { mapReservation, withinRange } from "./mappers";
import { scrapeReservations } from "./pages/reservations";

const log = createChildLogger("salonboard-client");

export interface SalonBoardClientOptions {
  timeZone: string;
  /** Opens the remote browser. Defaults to a Browserbase session. */
  openSession?: () => Promise<BrowserSession>;
}

function toScrapeError(error: unknown): ScrapeError {
  if (error instanceof ScrapeError) return error;
  const message = errorMessage(error);
  if (/net::|ECONN|ENOTFOUND|ETIMEDOUT/.test(message)) return new ScrapeError(message, "network");
  if (error instanceof Error && error.name === "TimeoutError") return new ScrapeError(message, "layout_changed");
  return new ScrapeError(message);
}

export class SalonBoardClient implements PortalSource {
  private session: BrowserSession | null = null;
  private readonly credentials: SalonBoardCredentials;
  private readonly options: SalonBoardClientOptions;

  constructor(credentials: SalonBoardCredentials, options: SalonBoardClientOptions) {
    this.credentials = credentials;
    this.options = options;
  }

  private async connect(): Promise<BrowserSession> {
    if (!this.session) {
      log.info("Connecting to Salon Board...");
      this.session = await (this.options.openSession ?? createBrowserSession)();
    }
    return this.session;
  }

  async fetchPortalAppointments(range: DateRange): Promise<PortalAppointment[]> {
    try {
      const { page } = await this.connect();
      await ensureLoggedIn(page, this.credentials);

      const rows = await scrapeReservations(page, this.credentials);
      const appointments = withinRange(rows.map(mapReservation), range, this.options.timeZone);

      log.info("Salon Board reservations fetched", { scraped: rows.length, inWindow: appointments.length });
      return appointments;
    } catch (error) {
      const scrapeError = toScrapeError(error);
      log.error("Salon Board scrape failed", { reason: scrapeError.reason, error: scrapeError.message });
      throw scrapeError;
    }
  }

  async close(): Promise<void> {
    if (this.session) {
      await closeBrowserSession(this.session);
      this.session = null;
      log.info("Disconnected from Salon Board");
    }
  }
}
