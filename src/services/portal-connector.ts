/**
 * Portal Payer Connector
 *
 * Selenium-driven eligibility lookup for payers that only offer a web
 * portal. Every element the connector touches comes from the payer's
 * navigation map, so a portal redesign is a data change.
 */

import { Builder, WebDriver, By, until, WebElement } from "selenium-webdriver";
import chrome from "selenium-webdriver/chrome.js";
import type { CoverageData } from "../types/eligibility.js";
import type { CoverageField, ElementLocator, Payer, PortalNavigationMap } from "../types/payer.js";
import type { AuthDecision } from "../types/pa-request.js";
import { COVERAGE_FIELDS } from "../types/payer.js";
import { loadPayerCredentials } from "../config.js";
import { PayerConnectorError } from "./errors.js";
import { Semaphore } from "./concurrency.js";
import {
  coerceCoverageField,
  requireMemberId,
  type CoverageResponse,
  type EligibilityQuery,
  type PayerConnector,
} from "./payer-connector.js";

/** Default timeouts */
const TIMEOUTS = {
  pageLoad: 20000,
  elementWait: 15000,
} as const;

/** Page text that means the portal did not find the member */
const NOT_FOUND_MARKERS = ["member not found", "no matching member", "invalid member id"] as const;

/**
 * The browser operations a portal lookup needs, addressed by
 * navigation-map locators.
 */
export interface PortalBrowser {
  open(url: string): Promise<void>;
  type(locator: ElementLocator, text: string): Promise<void>;
  click(locator: ElementLocator): Promise<void>;

  /** Resolves once the element is visible; rejects after `timeoutMs` */
  waitFor(locator: ElementLocator, timeoutMs: number): Promise<void>;

  /** Text of the first matching element, or undefined when there is none */
  textOf(locator: ElementLocator): Promise<string | undefined>;

  pageText(): Promise<string>;
  close(): Promise<void>;
}

export interface PortalConnectorConfig {
  /** Run in headless mode */
  headless?: boolean;

  /** Environment holding `<PREFIX>_PORTAL_USERNAME` / `_PORTAL_PASSWORD` */
  env?: Record<string, string | undefined>;

  /** Browser factory; defaults to a local Chrome */
  openBrowser?: () => Promise<PortalBrowser>;
}

/**
 * Convert a navigation-map locator to a Selenium locator.
 */
export function toBy(locator: ElementLocator): By {
  switch (locator.type) {
    case "id":
      return By.id(locator.value);
    case "name":
      return By.name(locator.value);
    case "xpath":
      return By.xpath(locator.value);
    case "css":
      return By.css(locator.value);
  }
}

/**
 * Turn the text read from each mapped element into coverage fields.
 * Fields whose text is blank or unparseable are left out.
 */
export function extractCoverage(
  texts: Partial<Record<CoverageField, string>>,
  memberId: string
): Partial<CoverageData> {
  let fields: Partial<CoverageData> = { memberId, serviceLimitations: [] };
  for (const field of COVERAGE_FIELDS) {
    const text = texts[field];
    if (text === undefined || text.trim() === "") continue;
    fields = { ...fields, ...coerceCoverageField(field, text) };
  }
  return fields;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * PortalBrowser over a Selenium WebDriver.
 */
export class SeleniumBrowser implements PortalBrowser {
  constructor(private driver: WebDriver) {}

  private async waitVisible(locator: By, timeout: number = TIMEOUTS.elementWait): Promise<WebElement> {
    const el = await this.driver.wait(until.elementLocated(locator), timeout);
    await this.driver.wait(until.elementIsVisible(el), timeout);
    return el;
  }

  async open(url: string): Promise<void> {
    await this.driver.get(url);
  }

  async type(locator: ElementLocator, text: string): Promise<void> {
    const input = await this.waitVisible(toBy(locator));
    await input.clear();
    await input.sendKeys(text);
  }

  /**
   * Scroll into view and click, with a JS click when Selenium's is intercepted.
   */
  async click(locator: ElementLocator): Promise<void> {
    const el = await this.waitVisible(toBy(locator));
    await this.driver.executeScript("arguments[0].scrollIntoView({block:'center', inline:'center'});", el);
    await this.driver.wait(until.elementIsEnabled(el), TIMEOUTS.elementWait);

    try {
      await el.click();
    } catch {
      console.log("[portal] Click intercepted, using JS click fallback");
      await this.driver.executeScript("arguments[0].click();", el);
    }
  }

  async waitFor(locator: ElementLocator, timeoutMs: number): Promise<void> {
    await this.waitVisible(toBy(locator), timeoutMs);
  }

  async textOf(locator: ElementLocator): Promise<string | undefined> {
    // Optional fields are often absent from the page
    const [first] = await this.driver.findElements(toBy(locator));
    return first ? first.getText() : undefined;
  }

  async pageText(): Promise<string> {
    return this.driver.findElement(By.css("body")).getText();
  }

  async close(): Promise<void> {
    await this.driver.quit();
  }
}

async function defaultBrowser(headless: boolean): Promise<PortalBrowser> {
  const options = new chrome.Options();
  options.addArguments(
    "--no-sandbox",
    "--disable-dev-shm-usage",
    "--disable-gpu",
    "--window-size=1600,1200"
  );

  if (headless) {
    options.addArguments("--headless=new");
  }

  const driver = await new Builder().forBrowser("chrome").setChromeOptions(options).build();
  return new SeleniumBrowser(driver);
}

/**
 * Portal connector. One browser session at a time; a caller that stops
 * waiting closes its session so the next lookup can start.
 */
export class PortalConnector implements PayerConnector {
  readonly channel = "portal" as const;
  private sessions = new Semaphore(1);
  private env: Record<string, string | undefined>;
  private openBrowser: () => Promise<PortalBrowser>;

  constructor(config: PortalConnectorConfig = {}) {
    const headless = config.headless ?? true;
    this.env = config.env ?? process.env;
    this.openBrowser = config.openBrowser ?? (() => defaultBrowser(headless));
  }

  private async login(browser: PortalBrowser, payer: Payer, map: PortalNavigationMap): Promise<void> {
    const { portalUsername, portalPassword } = loadPayerCredentials(payer.access.credentialsEnvPrefix, this.env);
    if (!portalUsername || !portalPassword) {
      throw new PayerConnectorError(
        `${payer.access.credentialsEnvPrefix}_PORTAL_USERNAME and ${payer.access.credentialsEnvPrefix}_PORTAL_PASSWORD required`,
        "MISSING_CREDENTIALS",
        false
      );
    }

    console.log(`[portal] Navigating to ${map.loginUrl}...`);
    await browser.open(map.loginUrl);
    await browser.type(map.login.username, portalUsername);
    await browser.type(map.login.password, portalPassword);
    await browser.click(map.login.submit);
  }

  private async search(
    browser: PortalBrowser,
    map: PortalNavigationMap,
    query: EligibilityQuery,
    memberId: string
  ): Promise<void> {
    if (map.eligibilityUrl) {
      await browser.open(map.eligibilityUrl);
    }

    const search = map.eligibilitySearch;
    await browser.type(search.memberId, memberId);
    if (search.dateOfBirth && query.dateOfBirth) {
      await browser.type(search.dateOfBirth, query.dateOfBirth);
    }
    await browser.click(search.submit);
  }

  private async readFields(browser: PortalBrowser, map: PortalNavigationMap): Promise<Partial<Record<CoverageField, string>>> {
    const texts: Partial<Record<CoverageField, string>> = {};
    for (const field of COVERAGE_FIELDS) {
      const locator = map.extraction[field];
      if (!locator) continue;
      const text = await browser.textOf(locator);
      if (text !== undefined) texts[field] = text;
    }
    return texts;
  }

  async checkEligibility(query: EligibilityQuery, payer: Payer, signal?: AbortSignal): Promise<CoverageResponse> {
    const memberId = requireMemberId(query);
    const map = payer.portalMap;
    if (!map) {
      throw new PayerConnectorError(`Payer ${payer.name} has no portal map`, "NO_CHANNEL", false);
    }

    return this.sessions.withPermit(async () => {
      if (signal?.aborted) {
        throw new PayerConnectorError(`Lookup of ${memberId} abandoned before the browser started`, "TIMEOUT", true);
      }

      const browser = await this.openBrowser().catch((err: unknown) => {
        throw new PayerConnectorError(`Browser failed to start: ${errorMessage(err)}`, "BROWSER_UNAVAILABLE", true);
      });

      let closing: Promise<void> | undefined;
      const close = (): Promise<void> => {
        closing ??= browser.close().catch((err: unknown) => {
          console.error(`[portal] ${payer.name}: browser did not close cleanly: ${errorMessage(err)}`);
        });
        return closing;
      };
      // Closing the session fails whatever step is in flight
      const onAbort = (): void => {
        console.log(`[portal] ${payer.name}: caller stopped waiting, closing the browser`);
        void close();
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      try {
        await this.login(browser, payer, map);
        await this.search(browser, map, query, memberId);

        const firstLocator = Object.values(map.extraction)[0];
        if (firstLocator) {
          await browser.waitFor(firstLocator, TIMEOUTS.pageLoad).catch(() => {
            console.log(`[portal] ${payer.name}: coverage details did not appear`);
          });
        }

        const pageText = (await browser.pageText()).toLowerCase();
        if (NOT_FOUND_MARKERS.some((marker) => pageText.includes(marker))) {
          throw new PayerConnectorError(`Member ${memberId} not found on ${payer.name} portal`, "INVALID_MEMBER_ID", false);
        }

        const texts = await this.readFields(browser, map);
        console.log(`[portal] ${payer.name}: read ${Object.keys(texts).length} coverage fields`);
        return { fields: extractCoverage(texts, memberId), raw: JSON.stringify(texts) };
      } catch (err) {
        if (err instanceof PayerConnectorError) throw err;
        // Element waits and page loads are worth retrying
        throw new PayerConnectorError(`Portal navigation failed: ${errorMessage(err)}`, "PORTAL_ERROR", true);
      } finally {
        signal?.removeEventListener("abort", onAbort);
        await close();
      }
    });
  }

  async submitPriorAuth(): Promise<AuthDecision> {
    throw new PayerConnectorError(
      "Portal payers do not accept electronic prior authorization",
      "ELECTRONIC_PA_UNSUPPORTED",
      false
    );
  }
}
