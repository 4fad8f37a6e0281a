import { readdirSync, readFileSync } from 'node:fs';
import { basename, extname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod/v4';
import { resolveConfig } from '../config.js';
import { ConfigurationError } from '../errors.js';
import type { TranslationDomains, Translator } from './types.js';

/** msgid → translation */
export type Catalog = Readonly<Record<string, string>>;

/** locale → domain → catalog */
export type Catalogs = Readonly<Record<string, Readonly<Record<string, Catalog>>>>;

const catalogSchema = z.record(z.string(), z.string());

function readCatalog(file: string): Catalog {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(file, 'utf8'));
  } catch (err) {
    throw new ConfigurationError(`Cannot read translation catalog ${file}: ${String(err)}`);
  }
  const result = catalogSchema.safeParse(parsed);
  if (!result.success) {
    throw new ConfigurationError(`Translation catalog ${file} must map message ids to strings`);
  }
  return result.data;
}

/**
 * Loads `<dir>/<locale>/<domain>.json` files. Each file is a flat object of
 * msgid → translation.
 */
export function loadCatalogs(dir: string): Catalogs {
  const catalogs: Record<string, Record<string, Catalog>> = {};
  for (const localeEntry of readdirSync(dir, { withFileTypes: true })) {
    if (!localeEntry.isDirectory()) continue;
    const domains: Record<string, Catalog> = {};
    const localeDir = join(dir, localeEntry.name);
    for (const file of readdirSync(localeDir)) {
      if (extname(file) !== '.json') continue;
      domains[basename(file, '.json')] = readCatalog(join(localeDir, file));
    }
    catalogs[localeEntry.name] = domains;
  }
  return catalogs;
}

/** Merges catalogs; entries of later catalogs win. */
export function mergeCatalogs(...sources: Catalogs[]): Catalogs {
  const merged: Record<string, Record<string, Catalog>> = {};
  for (const source of sources) {
    for (const [locale, domains] of Object.entries(source)) {
      const target = (merged[locale] ??= {});
      for (const [domain, catalog] of Object.entries(domains)) {
        target[domain] = { ...target[domain], ...catalog };
      }
    }
  }
  return merged;
}

export interface CatalogTranslatorOptions {
  catalogs: Catalogs;
  defaultLocale: string;
  /** Consulted when the requested locale has no entry. */
  fallbackLocale?: string;
  domains?: Partial<TranslationDomains>;
}

/**
 * Translator backed by catalogs. Lookup order: locale, fallback locale, msgid.
 */
export function createCatalogTranslator(options: CatalogTranslatorOptions): Translator {
  const { catalogs, defaultLocale, fallbackLocale } = options;
  const lookup = (locale: string | undefined, domain: string, msgid: string): string | undefined => {
    if (locale === undefined || !Object.hasOwn(catalogs, locale)) return undefined;
    const domains = catalogs[locale];
    if (domains === undefined || !Object.hasOwn(domains, domain)) return undefined;
    const catalog = domains[domain];
    return catalog !== undefined && Object.hasOwn(catalog, msgid) ? catalog[msgid] : undefined;
  };

  return {
    defaultLocale,
    ...(options.domains !== undefined ? { domains: options.domains } : {}),
    translate: (locale, domain, msgid) =>
      lookup(locale, domain, msgid) ?? lookup(fallbackLocale, domain, msgid) ?? msgid,
  };
}

/** Directory of the catalogs shipped with the package. */
export const BUNDLED_LOCALES_DIR = fileURLToPath(new URL('../../locales/', import.meta.url));

export interface DefaultTranslatorOptions {
  defaultLocale?: string;
  /** Extra catalogs merged over the bundled ones. */
  localesDir?: string;
}

/** Catalog translator over the bundled catalogs, optionally extended from `localesDir`. */
export function createDefaultTranslator(options: DefaultTranslatorOptions = {}): Translator {
  const bundled = loadCatalogs(BUNDLED_LOCALES_DIR);
  const catalogs = options.localesDir === undefined
    ? bundled
    : mergeCatalogs(bundled, loadCatalogs(options.localesDir));
  return createCatalogTranslator({ catalogs, defaultLocale: options.defaultLocale ?? 'en' });
}

let defaultTranslator: Translator | undefined;

/** The translator used when none is configured, built once from the environment's configuration. */
export function getDefaultTranslator(): Translator {
  if (defaultTranslator === undefined) {
    const { locale, localesDir } = resolveConfig();
    defaultTranslator = createDefaultTranslator({
      defaultLocale: locale,
      ...(localesDir !== undefined ? { localesDir } : {}),
    });
  }
  return defaultTranslator;
}
