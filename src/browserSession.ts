import { chromium, errors, type Browser, type Page, type Request } from "playwright-core";

export interface InterceptedRequest {
  url: string;
  method: string;
  headers: Record<string, string>;
  body: string | null;
}

export type RequestPredicate = (request: InterceptedRequest) => boolean;

/**
 * Minimal contract the authenticator needs from an automated browser.
 * `waitForElement` and `waitForRequest` resolve to false/null on timeout
 * instead of rejecting.
 */
export interface BrowserSession {
  goto(url: string): Promise<void>;
  waitForElement(selector: string, timeoutMs: number): Promise<boolean>;
  fill(selector: string, value: string): Promise<void>;
  click(selector: string): Promise<void>;
  waitForRequest(predicate: RequestPredicate, timeoutMs: number): Promise<InterceptedRequest | null>;
  close(): Promise<void>;
}

export interface LaunchOptions {
  headless: boolean;
  channel?: string | null;
  executablePath?: string | null;
}

export class PlaywrightBrowserSession implements BrowserSession {
  private closed = false;

  private constructor(
    private readonly browser: Browser,
    private readonly page: Page
  ) {}

  static async launch({ headless, channel, executablePath }: LaunchOptions): Promise<PlaywrightBrowserSession> {
    const browser = await chromium.launch({
      headless,
      channel: channel ?? undefined,
      executablePath: executablePath ?? undefined
    });
    try {
      const ctx = await browser.newContext();
      const page = await ctx.newPage();
      return new PlaywrightBrowserSession(browser, page);
    } catch (err) {
      await browser.close();
      throw err;
    }
  }

  async goto(url: string): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded" });
  }

  async waitForElement(selector: string, timeoutMs: number): Promise<boolean> {
    try {
      await this.page.locator(selector).first().waitFor({ state: "visible", timeout: timeoutMs });
      return true;
    } catch (err) {
      if (err instanceof errors.TimeoutError) return false;
      throw err;
    }
  }

  async fill(selector: string, value: string): Promise<void> {
    await this.page.locator(selector).first().fill(value);
  }

  async click(selector: string): Promise<void> {
    await this.page.locator(selector).first().click();
  }

  async waitForRequest(predicate: RequestPredicate, timeoutMs: number): Promise<InterceptedRequest | null> {
    try {
      const match = await this.page.waitForRequest((req: Request) => predicate(toIntercepted(req)), {
        timeout: timeoutMs
      });
      return toIntercepted(match);
    } catch (err) {
      // Closing the page rejects pending waiters; treat that like a timeout.
      if (err instanceof errors.TimeoutError || this.closed) return null;
      throw err;
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.browser.close();
  }
}

function toIntercepted(req: Request): InterceptedRequest {
  return {
    url: req.url(),
    method: req.method(),
    headers: req.headers(),
    body: req.postData()
  };
}
