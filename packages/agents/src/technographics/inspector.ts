/**
 * Website Inspection
 *
 * Turns a fetched page (headers + HTML) into a technology signal bag.
 * Fetching is bounded by a timeout; any failure yields null ("no data")
 * rather than an exception.
 *
 * @module technographics/inspector
 */

import { errorMessage } from '@cloud-prospector/lib';
import type { TechCategory, TechSignalBag } from './contracts/tech-signals';
import { SIGNATURES, type SignatureTable } from './signatures';
import { logger as defaultLogger, type TechnographicsLogger } from './logger';

// ===========================================
// Types
// ===========================================

export interface WebsiteSnapshot {
  /** Response headers keyed by (any-case) name */
  headers: Record<string, string>;
  html: string;
}

export type FetchLike = (
  url: string,
  init: { signal: AbortSignal; headers: Record<string, string>; redirect: 'follow' }
) => Promise<Response>;

export interface FetchWebsiteOptions {
  /** Request timeout in ms (default: 10,000) */
  timeoutMs?: number;
  userAgent?: string;
  fetch?: FetchLike;
  logger?: TechnographicsLogger;
}

export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;

const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko)';

// ===========================================
// Signal Accumulator
// ===========================================

class SignalCollector {
  private technologies = new Set<string>();
  private categories: Partial<Record<TechCategory, string[]>> = {};
  private awsServices = new Set<string>();

  add(name: string, category?: TechCategory): void {
    this.technologies.add(name);
    if (!category) return;

    const members = this.categories[category] ?? [];
    if (!members.includes(name)) {
      members.push(name);
    }
    this.categories[category] = members;
  }

  addAwsService(service: string): void {
    this.awsServices.add(service);
  }

  toBag(): TechSignalBag {
    return {
      technologies: Array.from(this.technologies),
      categories: this.categories,
      aws_services: Array.from(this.awsServices),
      tech_count: this.technologies.size,
    };
  }
}

// ===========================================
// HTML Helpers
// ===========================================

const ATTRIBUTE_PATTERN = /([a-zA-Z_:][-a-zA-Z0-9_:.]*)\s*=\s*(?:"([^"]*)"|'([^']*)')/g;

/**
 * Collect the attribute maps of every opening tag with the given name
 */
export function extractTagAttributes(html: string, tagName: string): Array<Record<string, string>> {
  const tagPattern = new RegExp(`<${tagName}\\b([^>]*)>`, 'gi');
  const tags: Array<Record<string, string>> = [];

  for (const tagMatch of html.matchAll(tagPattern)) {
    const attributes: Record<string, string> = {};
    for (const attr of tagMatch[1].matchAll(ATTRIBUTE_PATTERN)) {
      attributes[attr[1].toLowerCase()] = attr[2] ?? attr[3] ?? '';
    }
    tags.push(attributes);
  }

  return tags;
}

// ===========================================
// Inspection
// ===========================================

/**
 * Match a page against the signature table
 */
export function inspectWebsite(
  snapshot: WebsiteSnapshot,
  table: SignatureTable = SIGNATURES
): TechSignalBag {
  const collector = new SignalCollector();
  const content = snapshot.html.toLowerCase();
  const headers = Object.entries(snapshot.headers).map(
    ([name, value]) => [name.toLowerCase(), value.toLowerCase()] as const
  );

  // Headers
  for (const signature of table.technologies) {
    const headerHit = signature.headers.some((pattern) => {
      const needle = pattern.toLowerCase();
      return headers.some(([name, value]) => name.includes(needle) || value.includes(needle));
    });
    if (headerHit) {
      collector.add(signature.name, signature.category);
    }
  }

  // Content
  for (const signature of table.technologies) {
    if (signature.patterns.some((pattern) => content.includes(pattern.toLowerCase()))) {
      collector.add(signature.name, signature.category);
    }
  }

  // Managed-service indicators
  for (const [service, indicators] of Object.entries(table.aws_services)) {
    if (indicators.some((indicator) => content.includes(indicator.toLowerCase()))) {
      collector.addAwsService(service);
    }
  }

  // <meta name="generator">
  for (const meta of extractTagAttributes(snapshot.html, 'meta')) {
    if (meta.name?.toLowerCase() !== 'generator') continue;
    const generator = (meta.content ?? '').toLowerCase();
    for (const cms of table.meta_generators) {
      if (generator.includes(cms)) {
        collector.add(cms, 'cms');
      }
    }
  }

  // <script src> libraries; first matching library wins per script
  for (const script of extractTagAttributes(snapshot.html, 'script')) {
    const src = script.src?.toLowerCase();
    if (!src) continue;
    const library = table.script_libraries.find((lib) => src.includes(lib.pattern));
    if (library) {
      collector.add(library.name, library.category);
    }
  }

  return collector.toBag();
}

/**
 * Prefix bare domains with https://
 */
export function normalizeWebsiteUrl(url: string): string {
  const trimmed = url.trim();
  return /^https?:\/\//i.test(trimmed) ? trimmed : `https://${trimmed}`;
}

/**
 * Fetch a website and inspect it. Returns null on timeout, network error
 * or a non-2xx response.
 */
export async function fetchWebsiteSignals(
  url: string,
  options: FetchWebsiteOptions = {}
): Promise<TechSignalBag | null> {
  const log = options.logger ?? defaultLogger;
  const fetchImpl: FetchLike = options.fetch ?? fetch;
  const target = normalizeWebsiteUrl(url);
  const startTime = Date.now();

  let response: Response;
  try {
    response = await fetchImpl(target, {
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS),
      headers: { 'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT },
      redirect: 'follow',
    });
  } catch (error) {
    const timedOut = error instanceof Error && error.name === 'TimeoutError';
    log.websiteFetchFailed({
      url: target,
      reason: timedOut ? 'timeout' : 'network_error',
      error_message: errorMessage(error),
    });
    return null;
  }

  if (!response.ok) {
    log.websiteFetchFailed({
      url: target,
      reason: 'http_status',
      error_message: `HTTP ${response.status}`,
      status: response.status,
    });
    return null;
  }

  let html: string;
  try {
    html = await response.text();
  } catch (error) {
    log.websiteFetchFailed({
      url: target,
      reason: 'network_error',
      error_message: errorMessage(error),
    });
    return null;
  }

  const headers: Record<string, string> = {};
  response.headers.forEach((value, name) => {
    headers[name] = value;
  });

  const bag = inspectWebsite({ headers, html });

  log.websiteInspected({
    url: target,
    status: response.status,
    tech_count: bag.tech_count,
    duration_ms: Date.now() - startTime,
  });

  return bag;
}
