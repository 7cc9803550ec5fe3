import { CompanyDescriptor } from './types';

// Company domain -> Greenhouse board token (the slug in boards-api.greenhouse.io/v1/boards/{token}/jobs)
const GREENHOUSE_TOKENS: Readonly<Record<string, string>> = {
  'anthropic.com': 'anthropic',
  'databricks.com': 'databricks',
  'vercel.com': 'vercel',
  'cohere.com': 'cohere',
  'duolingo.com': 'duolingo',
  'notion.so': 'notion',
  'ramp.com': 'ramp',
  'gitlab.com': 'gitlab',
  'scale.com': 'scaleai',
  'wandb.ai': 'wandb',
  'figma.com': 'figma',
  'doordash.com': 'doordash',
  'brex.com': 'brex',
  'together.ai': 'togetherai',
  'hex.tech': 'hex',
};

export function greenhouseTokenForDomain(domain: string | null): string | null {
  if (!domain) return null;
  return GREENHOUSE_TOKENS[domain.toLowerCase()] ?? null;
}

/** `linear.app` -> `linear` */
export function slugFromDomain(domain: string | null): string | null {
  if (!domain) return null;
  const label = domain.toLowerCase().replace(/^www\./, '').split('.')[0];
  return label ? label : null;
}

export function resolveBoardToken(company: CompanyDescriptor): string | null {
  if (company.boardToken) return company.boardToken;
  if (company.careersPlatform?.toLowerCase() === 'greenhouse') return greenhouseTokenForDomain(company.domain);
  return slugFromDomain(company.domain);
}
