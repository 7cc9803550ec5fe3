import fs from 'fs';
import { z } from 'zod';
import { ValidationError } from '../errors';
import { createLogger } from '../logger';
import { PLATFORMS } from '../scrapers/types';
import { SignalStore } from './index';
import {
  ADOPTION_LEVELS,
  AI_SIGNAL_TYPES,
  IMPACT_LEVELS,
  LEADERSHIP_SIGNAL_TYPES,
} from './types';

const log = createLogger('import');

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}/, 'expected YYYY-MM-DD');
const optionalText = z.string().trim().min(1).nullish();

const leadershipSchema = z.object({
  leaderName: z.string().trim().min(1),
  leaderTitle: optionalText,
  signalType: z.enum(LEADERSHIP_SIGNAL_TYPES).nullish(),
  content: z.string().trim().min(1),
  sourceUrl: optionalText,
  impactLevel: z.enum(IMPACT_LEVELS).nullish(),
  dateObserved: isoDate.nullish(),
});

const toolSchema = z.object({
  toolName: z.string().trim().min(1),
  adoptionLevel: z.enum(ADOPTION_LEVELS).nullish(),
  evidenceUrl: optionalText,
  evidenceExcerpt: optionalText,
  dateObserved: isoDate.nullish(),
});

const aiSignalSchema = z.object({
  signalType: z.enum(AI_SIGNAL_TYPES),
  title: z.string().trim().min(1),
  sourceUrl: optionalText,
  sourceName: optionalText,
  excerpt: optionalText,
  signalStrength: z.number().int().min(1).max(5).nullish(),
  dateObserved: isoDate.nullish(),
  verified: z.boolean().optional(),
});

const companySchema = z.object({
  name: z.string().trim().min(1),
  domain: optionalText,
  careersUrl: z.string().url().nullish(),
  careersPlatform: z.enum(PLATFORMS).nullish(),
  boardToken: optionalText,
  tier: z.union([z.literal(1), z.literal(2), z.literal(3), z.literal(4)]).optional(),
  leadership: z.array(leadershipSchema).default([]),
  tools: z.array(toolSchema).default([]),
  signals: z.array(aiSignalSchema).default([]),
});

export const companyImportSchema = z.object({
  companies: z.array(companySchema),
});

export type CompanyImport = z.input<typeof companyImportSchema>;

export interface ImportSummary {
  companies: number;
  skipped: string[];
  leadershipSignals: number;
  toolAdoptions: number;
  aiSignals: number;
  /** Ids of the companies inserted, in file order */
  companyIds: string[];
}

/**
 * Inserts companies and their evidence in one transaction. A company whose
 * name already exists (case-insensitive) is skipped together with its
 * evidence.
 */
export function importCompanies(store: SignalStore, data: unknown): ImportSummary {
  const parsed = companyImportSchema.safeParse(data);
  if (!parsed.success) {
    throw new ValidationError(
      'Invalid company import',
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const summary: ImportSummary = {
    companies: 0,
    skipped: [],
    leadershipSignals: 0,
    toolAdoptions: 0,
    aiSignals: 0,
    companyIds: [],
  };

  store.transaction(() => {
    for (const entry of parsed.data.companies) {
      const existing = store.findCompanyByName(entry.name);
      if (existing && existing.name.toLowerCase() === entry.name.toLowerCase()) {
        summary.skipped.push(entry.name);
        continue;
      }

      const { leadership, tools, signals, ...fields } = entry;
      const company = store.addCompany(fields);
      summary.companies++;
      summary.companyIds.push(company.id);

      for (const signal of leadership) {
        store.addLeadershipSignal({ companyId: company.id, ...signal });
        summary.leadershipSignals++;
      }
      for (const tool of tools) {
        store.addToolAdoption({ companyId: company.id, ...tool });
        summary.toolAdoptions++;
      }
      for (const signal of signals) {
        store.addAiSignal({ companyId: company.id, ...signal });
        summary.aiSignals++;
      }
    }
  });

  log.info(
    { imported: summary.companies, skipped: summary.skipped.length },
    'Company import finished',
  );
  return summary;
}

export function importCompaniesFromFile(store: SignalStore, filePath: string): ImportSummary {
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ValidationError(`Cannot read import file ${filePath}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }
  return importCompanies(store, data);
}
