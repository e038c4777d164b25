import { koPrompts } from './prompts/ko';
import { enPrompts } from './prompts/en';
import { koOutputs } from './outputs/ko';
import { enOutputs, Outputs } from './outputs/en';
import { PromptTemplates } from './prompts/types';

export type SupportedLanguage = 'ko' | 'en';

export class I18nManager {
  private static instance: I18nManager;
  private currentLanguage: SupportedLanguage = 'en';

  private constructor() {}

  public static getInstance(): I18nManager {
    if (!I18nManager.instance) {
      I18nManager.instance = new I18nManager();
    }
    return I18nManager.instance;
  }

  public getLanguage(): SupportedLanguage {
    return this.currentLanguage;
  }

  // called once at startup with the configured language
  public setLanguage(lang: SupportedLanguage): void {
    this.currentLanguage = lang;
  }

  public getOutputs(): Outputs {
    return this.currentLanguage === 'ko' ? koOutputs : enOutputs;
  }
}

export function promptsFor(lang: SupportedLanguage): PromptTemplates {
  return lang === 'ko' ? koPrompts : enPrompts;
}

export const i18n = () => I18nManager.getInstance();
