import { z } from 'zod';
import { loadData } from './data.js';

export type LinkClassification =
  | { readonly kind: 'company' }
  | { readonly kind: 'aggregator'; readonly name: string };

export interface SeparatedLinks {
  companyLink?: string;
  aggregatorLink?: string;
  aggregatorName?: string;
}

const aggregatorTableSchema = z
  .array(
    z.object({
      domain: z
        .string()
        .min(1)
        .transform((domain) => domain.trim().toLowerCase()),
      name: z.string().min(1),
    }),
  )
  .min(1);

export type AggregatorDomain = z.infer<typeof aggregatorTableSchema>[number];

/**
 * Known job boards and applicant-tracking vendors, most specific domain first.
 */
export const AGGREGATOR_DOMAINS: readonly AggregatorDomain[] = Object.freeze(
  loadData('aggregators.json', aggregatorTableSchema).map((entry) => Object.freeze(entry)),
);

const COMPANY: LinkClassification = Object.freeze({ kind: 'company' });
const SCHEME_PATTERN = /^[a-z][a-z\d+.-]*:\/\//i;

/**
 * Hostname of a URL, accepting scheme-less input such as `jobs.example.com/1`.
 */
function hostOf(url: string): string | undefined {
  const candidate = SCHEME_PATTERN.test(url) ? url : `https://${url}`;
  try {
    const host = new URL(candidate).hostname.toLowerCase();
    return host.includes('.') ? host.replace(/^www\./, '') : undefined;
  } catch {
    return undefined;
  }
}

function matchesDomain(host: string, domain: string): boolean {
  return host === domain || host.endsWith(`.${domain}`);
}

/**
 * Decide whether a URL points at a third-party aggregator or at the employer.
 * Never throws; anything that is not a recognizable aggregator URL is `company`.
 */
export function classifyLink(url: unknown): LinkClassification {
  if (typeof url !== 'string') {
    return COMPANY;
  }

  const lowered = url.trim().toLowerCase();
  if (!lowered) {
    return COMPANY;
  }

  const host = hostOf(lowered);
  for (const { domain, name } of AGGREGATOR_DOMAINS) {
    const matched = host ? matchesDomain(host, domain) : lowered.includes(domain);
    if (matched) {
      return { kind: 'aggregator', name };
    }
  }

  return COMPANY;
}

export function isAggregator(url: unknown): boolean {
  return classifyLink(url).kind === 'aggregator';
}

export function aggregatorNameOf(url: unknown): string | undefined {
  const classification = classifyLink(url);
  return classification.kind === 'aggregator' ? classification.name : undefined;
}

/**
 * Human-readable name from a URL host: `https://careers.acme.com/x` gives `Acme`.
 */
export function domainName(url: string): string | undefined {
  const host = hostOf(url.trim());
  if (!host) {
    return undefined;
  }

  const labels = host.split('.').filter(Boolean);
  const label = labels[labels.length - 2];
  if (!label) {
    return undefined;
  }

  return label
    .split('-')
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join('-');
}

/**
 * First company link and first aggregator link (with its name) from a list.
 */
export function separateLinks(links: readonly string[]): SeparatedLinks {
  const separated: SeparatedLinks = {};

  for (const raw of links) {
    const link = raw.trim();
    if (!link) continue;

    const classification = classifyLink(link);
    if (classification.kind === 'aggregator') {
      if (separated.aggregatorLink === undefined) {
        separated.aggregatorLink = link;
        separated.aggregatorName = classification.name;
      }
    } else if (separated.companyLink === undefined) {
      separated.companyLink = link;
    }
  }

  return separated;
}
