import enUS from './locales/en-US.json';
import zhCN from './locales/zh-CN.json';

export type MessageKey = keyof typeof enUS;
type MessageTable = Readonly<Record<MessageKey, string>>;

const TABLES = {
  'en-US': enUS,
  'zh-CN': zhCN,
} satisfies Record<string, MessageTable>;

export type Language = keyof typeof TABLES;

export const DEFAULT_LANGUAGE: Language = 'en-US';
export const SUPPORTED_LANGUAGES: readonly Language[] = ['en-US', 'zh-CN'];

export const isSupportedLanguage = (language: string): language is Language =>
  Object.prototype.hasOwnProperty.call(TABLES, language);

/** Maps an arbitrary language code onto a supported one. */
export const normalizeLanguage = (language: string | undefined): Language =>
  language !== undefined && isSupportedLanguage(language) ? language : DEFAULT_LANGUAGE;

const lookup = (table: Readonly<Record<string, string>>, key: string): string | undefined =>
  Object.prototype.hasOwnProperty.call(table, key) ? table[key] : undefined;

/**
 * Resolves a UI string: the language's table, then the default language's,
 * then the key itself.
 */
export function text(key: string, language: string = DEFAULT_LANGUAGE): string {
  const table: Readonly<Record<string, string>> = TABLES[normalizeLanguage(language)];
  return lookup(table, key) ?? lookup(TABLES[DEFAULT_LANGUAGE], key) ?? key;
}

/** Binds {@link text} to one language for a render pass. */
export const translator = (language: string): ((key: MessageKey) => string) =>
  (key) => text(key, language);
