import { chromium, type Browser, type Page } from "playwright-core";
import { FetchError, errorMessage } from "./errors";
import { Logger } from "./logger";

/** The slice of a browser tab the adapters drive. */
export interface BrowserSession {
  goto(url: string): Promise<void>;
  content(): Promise<string>;
  scrollToBottom(): Promise<void>;
  pageHeight(): Promise<number>;
  close(): Promise<void>;
}

export type BrowserLauncher = () => Promise<BrowserSession>;

export interface BrowserRuntimeConfig {
  headless: boolean;
  executablePath?: string;
  userAgent: string;
  timeoutMs: number;
}

class PlaywrightSession implements BrowserSession {
  private currentUrl = "about:blank";

  constructor(
    private readonly browser: Browser,
    private readonly page: Page,
    private readonly timeoutMs: number
  ) {}

  async goto(url: string): Promise<void> {
    this.currentUrl = url;
    try {
      await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: this.timeoutMs });
    } catch (error) {
      throw new FetchError(url, `navigation failed: ${errorMessage(error)}`, undefined, { cause: error });
    }
  }

  async content(): Promise<string> {
    try {
      return await this.page.content();
    } catch (error) {
      throw new FetchError(this.currentUrl, `content read failed: ${errorMessage(error)}`, undefined, { cause: error });
    }
  }

  async scrollToBottom(): Promise<void> {
    try {
      await this.page.evaluate("window.scrollTo(0, document.body.scrollHeight)");
    } catch (error) {
      throw new FetchError(this.currentUrl, `scroll failed: ${errorMessage(error)}`, undefined, { cause: error });
    }
  }

  async pageHeight(): Promise<number> {
    let height: unknown;
    try {
      height = await this.page.evaluate("document.body.scrollHeight");
    } catch (error) {
      throw new FetchError(this.currentUrl, `height read failed: ${errorMessage(error)}`, undefined, { cause: error });
    }
    return typeof height === "number" && Number.isFinite(height) ? height : 0;
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

export function createBrowserLauncher(runtime: BrowserRuntimeConfig): BrowserLauncher {
  return async () => {
    let browser: Browser;
    try {
      browser = await chromium.launch({
        headless: runtime.headless,
        ...(runtime.executablePath ? { executablePath: runtime.executablePath } : {})
      });
    } catch (error) {
      throw new FetchError("browser://launch", `browser launch failed: ${errorMessage(error)}`, undefined, { cause: error });
    }

    try {
      const context = await browser.newContext({
        userAgent: runtime.userAgent,
        viewport: { width: 1366, height: 900 },
        locale: "en-US"
      });
      const page = await context.newPage();
      return new PlaywrightSession(browser, page, runtime.timeoutMs);
    } catch (error) {
      await browser.close();
      throw new FetchError("browser://launch", `page setup failed: ${errorMessage(error)}`, undefined, { cause: error });
    }
  };
}

/** Opens a session for `work` and closes it on every exit path. */
export async function withBrowserSession<T>(
  launch: BrowserLauncher,
  logger: Logger,
  work: (session: BrowserSession) => Promise<T>
): Promise<T> {
  const session = await launch();
  logger.debug("browser_session_opened");
  try {
    return await work(session);
  } finally {
    try {
      await session.close();
      logger.debug("browser_session_closed");
    } catch (error) {
      logger.warn("browser_close_failed", { error });
    }
  }
}

/**
 * Defers the launch until a caller actually needs the browser, so runs served entirely
 * from cache never start one. A failed launch is remembered and rethrown by later
 * `acquire` calls without launching again. `close` is a no-op when nothing was opened.
 */
export class LazyBrowserSession {
  private session: BrowserSession | null = null;
  private launchFailure: { error: unknown } | null = null;

  constructor(
    private readonly launch: BrowserLauncher,
    private readonly logger: Logger
  ) {}

  get unavailable(): boolean {
    return this.launchFailure !== null;
  }

  async acquire(): Promise<BrowserSession> {
    if (this.launchFailure) {
      throw this.launchFailure.error;
    }
    if (!this.session) {
      try {
        this.session = await this.launch();
      } catch (error) {
        this.launchFailure = { error };
        this.logger.warn("browser_launch_failed", { error: errorMessage(error) });
        throw error;
      }
      this.logger.debug("browser_session_opened");
    }
    return this.session;
  }

  async close(): Promise<void> {
    const session = this.session;
    this.session = null;
    if (!session) {
      return;
    }
    try {
      await session.close();
      this.logger.debug("browser_session_closed");
    } catch (error) {
      this.logger.warn("browser_close_failed", { error });
    }
  }
}
