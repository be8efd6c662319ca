/**
 * CLI i18n 初始化
 * 使用 i18next（纯 Node.js），翻译文件放在 shared/i18n/locales
 */

import i18next from 'i18next'
import zh from '../shared/i18n/locales/zh.json'
import en from '../shared/i18n/locales/en.json'

/** 支持的语言列表 */
export const SUPPORTED_LANGUAGES = ['en', 'zh'] as const
export type SupportedLanguage = (typeof SUPPORTED_LANGUAGES)[number]

function isSupportedLanguage(lang: string): lang is SupportedLanguage {
  return (SUPPORTED_LANGUAGES as readonly string[]).includes(lang)
}

/** 将系统 locale 映射到支持的语言（如 zh_CN.UTF-8 → zh、en-US → en） */
export function resolveLocale(locale: string): SupportedLanguage {
  const lang = locale.split(/[-_.]/)[0].toLowerCase()
  return isSupportedLanguage(lang) ? lang : 'en'
}

/** 初始化 i18next（CLI 启动时调用，资源内联，同步完成） */
export function initI18n(language: SupportedLanguage): void {
  void i18next.init({
    lng: language,
    fallbackLng: 'en',
    interpolation: { escapeValue: false },
    resources: {
      zh: { translation: zh },
      en: { translation: en }
    }
  })
}

/** 切换语言（配置解析完成后调用） */
export async function changeLanguage(lang: SupportedLanguage): Promise<void> {
  await i18next.changeLanguage(lang)
}

/** 翻译函数（各模块直接使用） */
export const t = i18next.t.bind(i18next)
