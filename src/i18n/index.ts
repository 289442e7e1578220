import i18next from 'i18next';

import de from './locales/de.json';
import en from './locales/en.json';

const resources = {
  de: { translation: de },
  en: { translation: en },
};

export type SupportedLanguage = keyof typeof resources;

/**
 * Standalone i18n instance, used outside of any UI framework.
 * Resources are bundled, so initialization completes synchronously.
 */
const i18n = i18next.createInstance();

i18n
  .init({
    resources,
    lng: 'en',
    fallbackLng: 'en',
    initImmediate: false,
    interpolation: {
      escapeValue: false,
    },
  })
  .catch((error: unknown) => {
    console.error('[I18N] Failed to initialize translations:', error);
  });

/**
 * Check whether a language code has bundled translations.
 */
export function isSupportedLanguage(language: string): language is SupportedLanguage {
  return Object.prototype.hasOwnProperty.call(resources, language);
}

/**
 * Switch the active language, falling back to English for unknown codes.
 */
export async function initI18n(language: string): Promise<void> {
  const selectedLanguage = isSupportedLanguage(language) ? language : 'en';
  await i18n.changeLanguage(selectedLanguage);
}

/**
 * Translate a key in the active language.
 */
export function t(key: string): string {
  return i18n.t(key);
}

export default i18n;
