/**
 * Localized diagnostic messages.
 *
 * Templates may contain `<color=...>` markup (see markup.ts) and positional
 * placeholders `{0}`, `{1}` filled by formatTemplate().
 */

import {
  SUPPORTED_LANGUAGES,
  type LanguageSetting,
  type LanguageTag,
  type MessageCatalog,
} from "./types.js";

export const SDKPATH_VERSION = "0.1.0";

export const DEFAULT_LANGUAGE: LanguageTag = "en";

const EN_MESSAGES: MessageCatalog = {
  explanation:
    "\nsdkpath checks that the .NET SDK used by editor tooling is reachable through the PATH, with the 64-bit install ahead of the 32-bit one.\n** sdkpath {0} **",
  systemPath: "\nCurrent system PATH where executables are searched for: {0}",
  sdk64Only:
    "<color=#90ee90>TEST PASSED</color> → .NET SDK (64-bit) is in the PATH. 64-bit SDK path: ",
  sdk32Only:
    "<color=red>TEST FAILED</color> → .NET SDK (32-bit) is in the PATH, but not .NET SDK (64-bit). 32-bit SDK path: ",
  bothCorrect:
    "<color=#90ee90>TEST PASSED</color> → .NET SDK (64-bit) is in the PATH before the 32-bit version. 64-bit SDK path: ",
  bothWrongOrder:
    "<color=yellow>TEST PARTIALLY FAILED</color> → .NET SDK (64-bit) is in the PATH, BUT after the 32-bit version, so tools resolving `dotnet` pick the 32-bit SDK. 32-bit SDK path: ",
  notFound: "<color=red>TEST FAILED</color> → .NET SDK is not found in the PATH. ",
};

const FR_MESSAGES: MessageCatalog = {
  explanation:
    "\nsdkpath vérifie que le .NET SDK utilisé par les outils de l'éditeur est accessible par le PATH, la version 64-bit avant la version 32-bit.\n** sdkpath {0} **",
  systemPath: "\nChemin d'accès système actuel où les exécutables sont recherchés : {0}",
  sdk64Only:
    "<color=#90ee90>TEST RÉUSSI</color> → .NET SDK (64-bit) est dans le PATH. Chemin du SDK 64-bit : ",
  sdk32Only:
    "<color=red>TEST ÉCHOUÉ</color> → .NET SDK (32-bit) est dans le PATH, mais pas .NET SDK (64-bit). Chemin du SDK 32-bit : ",
  bothCorrect:
    "<color=#90ee90>TEST RÉUSSI</color> → .NET SDK (64-bit) est dans le PATH avant la version 32-bit. Chemin du SDK 64-bit : ",
  bothWrongOrder:
    "<color=yellow>TEST PARTIELLEMENT ÉCHOUÉ</color> → .NET SDK (64-bit) est dans le PATH, MAIS après la version 32-bit, donc les outils qui cherchent `dotnet` trouvent le SDK 32-bit. Chemin du SDK 32-bit : ",
  notFound: "<color=red>TEST ÉCHOUÉ</color> → .NET SDK n'est pas trouvé dans le PATH. ",
};

const CATALOGS: Record<LanguageTag, MessageCatalog> = {
  en: EN_MESSAGES,
  fr: FR_MESSAGES,
};

/**
 * Map a locale string (`fr-CA`, `fr_FR.UTF-8`, `EN`) to a supported tag.
 */
export function normalizeLanguage(locale: string | undefined): LanguageTag | null {
  if (!locale) {
    return null;
  }

  const primary = locale.toLowerCase().split(/[-_.@]/)[0];
  return SUPPORTED_LANGUAGES.find((tag) => tag === primary) ?? null;
}

/**
 * Pick the catalog language: an explicit setting wins, `auto` walks the
 * system locales in order, and anything unsupported lands on English.
 */
export function resolveLanguage(
  configured: LanguageSetting | undefined,
  systemLocales: readonly string[],
): LanguageTag {
  if (configured && configured !== "auto") {
    return configured;
  }

  for (const locale of systemLocales) {
    const normalized = normalizeLanguage(locale);
    if (normalized) {
      return normalized;
    }
  }

  return DEFAULT_LANGUAGE;
}

export function getCatalog(language: LanguageTag): MessageCatalog {
  return CATALOGS[language];
}

/**
 * Replace `{0}`, `{1}`, ... with the matching argument. Placeholders with
 * no argument are left in place.
 */
export function formatTemplate(template: string, ...args: string[]): string {
  return template.replace(/\{(\d+)\}/g, (token, index: string) => {
    const value = args[Number(index)];
    return value === undefined ? token : value;
  });
}
