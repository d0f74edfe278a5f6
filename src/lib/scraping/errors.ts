/**
 * Crawl Error Handling
 * Error classes and the transient / blocking / permanent taxonomy
 */

export enum ErrorCategory {
  TRANSIENT = 'transient',   // Retried with backoff up to maxAttempts
  BLOCKING = 'blocking',     // Identity cooldown + governor backoff, retried with a new identity
  PERMANENT = 'permanent',   // Dropped immediately
}

/**
 * Outcome recorded in the crawl log for every fetch attempt
 */
export enum CrawlOutcome {
  SUCCESS = 'success',
  CLIENT_ERROR = '4xx',
  SERVER_ERROR = '5xx',
  TIMEOUT = 'timeout',
  BLOCKED = 'blocked',
  NETWORK_ERROR = 'network_error',
}

export interface Classification {
  category: ErrorCategory;
  outcome: CrawlOutcome;
  message: string;
  statusCode?: number;
}

export enum FetchErrorCode {
  TIMEOUT = 'TIMEOUT',
  NETWORK = 'NETWORK',
  INVALID_URL = 'INVALID_URL',
}

export class FetchError extends Error {
  constructor(
    message: string,
    readonly code: FetchErrorCode,
    readonly cause?: unknown
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

export class ParseError extends Error {
  constructor(
    message: string,
    readonly siteId: string,
    readonly url?: string
  ) {
    super(message);
    this.name = 'ParseError';
  }
}

export class PoolExhaustedError extends Error {
  constructor(
    readonly siteId: string,
    readonly retryAt: number
  ) {
    super(`No eligible identity for ${siteId}`);
    this.name = 'PoolExhaustedError';
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

// Present only on interstitial challenge pages, never on pages that merely load the vendor's assets
const CHALLENGE_MARKERS = ['cf-chl', '/cdn-cgi/challenge-platform/', 'cf_chl_opt', 'ddos-guard'];
const CHALLENGE_TITLES = ['just a moment', 'attention required', 'please wait', 'security check'];

const CAPTCHA_WIDGET = /class\s*=\s*["'][^"']*\b(?:g-recaptcha|h-captcha|cf-turnstile)\b/;
const CAPTCHA_PROMPTS = [
  'verify you are human',
  'verify that you are human',
  'are you a robot',
  "i'm not a robot",
  'complete the security check',
  'solve the captcha',
];

const BOT_WALL_PHRASES = ['unusual traffic', 'automated access', 'bot detected'];

function pageTitle(lowerHtml: string): string {
  const match = /<title[^>]*>([^<]*)<\/title>/.exec(lowerHtml);
  return match ? match[1].trim() : '';
}

/**
 * Recognise a challenge or CAPTCHA wall served in place of the page.
 * A page that only embeds a CAPTCHA script (login modal, apply form) is not a wall.
 */
export function detectBlocking(html: string): string | null {
  const lowerHtml = html.toLowerCase();

  const title = pageTitle(lowerHtml);
  if (
    CHALLENGE_MARKERS.some((marker) => lowerHtml.includes(marker)) ||
    CHALLENGE_TITLES.some((challengeTitle) => title.startsWith(challengeTitle))
  ) {
    return 'Challenge page detected';
  }

  if (CAPTCHA_WIDGET.test(lowerHtml) && CAPTCHA_PROMPTS.some((prompt) => lowerHtml.includes(prompt))) {
    return 'CAPTCHA required';
  }

  if (BOT_WALL_PHRASES.some((phrase) => lowerHtml.includes(phrase))) {
    return 'Bot detected';
  }

  return null;
}

/**
 * Classify an HTTP response. Returns null for a usable page.
 */
export function classifyResponse(statusCode: number, body: string): Classification | null {
  if (statusCode === 403 || statusCode === 429) {
    const challenge = detectBlocking(body);
    const reason = statusCode === 429 ? 'Rate limited by server' : 'Request blocked by server';
    return {
      category: ErrorCategory.BLOCKING,
      outcome: CrawlOutcome.BLOCKED,
      message: challenge ? `${reason}: ${challenge}` : reason,
      statusCode,
    };
  }

  if (statusCode >= 500) {
    return {
      category: ErrorCategory.TRANSIENT,
      outcome: CrawlOutcome.SERVER_ERROR,
      message: `Server error ${statusCode}`,
      statusCode,
    };
  }

  if (statusCode === 408) {
    return {
      category: ErrorCategory.TRANSIENT,
      outcome: CrawlOutcome.TIMEOUT,
      message: 'Server request timeout',
      statusCode,
    };
  }

  if (statusCode >= 400) {
    return {
      category: ErrorCategory.PERMANENT,
      outcome: CrawlOutcome.CLIENT_ERROR,
      message: statusCode === 404 ? 'Page not found' : `Client error ${statusCode}`,
      statusCode,
    };
  }

  const blocked = detectBlocking(body);
  if (blocked) {
    return {
      category: ErrorCategory.BLOCKING,
      outcome: CrawlOutcome.BLOCKED,
      message: blocked,
      statusCode,
    };
  }

  return null;
}

const NETWORK_ERROR_CODES = ['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE', 'UND_ERR_SOCKET'];
const TIMEOUT_ERROR_CODES = ['ETIMEDOUT', 'ESOCKETTIMEDOUT', 'UND_ERR_CONNECT_TIMEOUT', 'UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT'];

/**
 * The `code` of a system error. Checked by shape: errors raised inside Node's
 * own modules do not always pass `instanceof Error` under a test sandbox.
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function errorName(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    return error.name;
  }
  return undefined;
}

/**
 * Classify a thrown fetch error
 */
export function classifyError(error: unknown): Classification {
  if (error instanceof FetchError) {
    switch (error.code) {
      case FetchErrorCode.TIMEOUT:
        return { category: ErrorCategory.TRANSIENT, outcome: CrawlOutcome.TIMEOUT, message: error.message };
      case FetchErrorCode.INVALID_URL:
        return { category: ErrorCategory.PERMANENT, outcome: CrawlOutcome.CLIENT_ERROR, message: error.message };
      case FetchErrorCode.NETWORK:
        return { category: ErrorCategory.TRANSIENT, outcome: CrawlOutcome.NETWORK_ERROR, message: error.message };
    }
  }

  const message = error instanceof Error ? error.message : String(error);
  const code = errorCode(error);
  const name = errorName(error);

  if (
    (code && TIMEOUT_ERROR_CODES.includes(code)) ||
    name === 'TimeoutError' ||
    name === 'AbortError' ||
    message.toLowerCase().includes('timeout')
  ) {
    return { category: ErrorCategory.TRANSIENT, outcome: CrawlOutcome.TIMEOUT, message: 'Request timed out' };
  }

  if (code && NETWORK_ERROR_CODES.includes(code)) {
    return { category: ErrorCategory.TRANSIENT, outcome: CrawlOutcome.NETWORK_ERROR, message: `Network connection failed (${code})` };
  }

  // Unknown errors are retried; the attempt budget bounds them
  return { category: ErrorCategory.TRANSIENT, outcome: CrawlOutcome.NETWORK_ERROR, message: message || 'Unknown error' };
}

/**
 * Outcomes that count against a site's error rate. Permanent 4xx responses
 * say nothing about the site's health.
 */
export function isSiteFailure(outcome: CrawlOutcome): boolean {
  return outcome !== CrawlOutcome.SUCCESS && outcome !== CrawlOutcome.CLIENT_ERROR;
}

/**
 * Exponential backoff delay for the n-th transient failure (1-based)
 */
export function calculateRetryDelay(attemptCount: number, baseDelay: number, maxDelay: number): number {
  const exponentialDelay = baseDelay * Math.pow(2, Math.max(0, attemptCount - 1));
  return Math.min(exponentialDelay, maxDelay);
}
