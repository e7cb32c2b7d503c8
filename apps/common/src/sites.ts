import type { AppEnv } from "./env.js";
import { ConfigError, UnknownSiteError } from "./errors.js";
import {
  SITE_IDS,
  type AuthorProfile,
  type SiteConfig,
  type SiteCredentials,
  type SiteId,
} from "./types.js";

const DEFAULT_SITE_URL = "http://localhost:3000";

const MFO_SITE: SiteConfig = {
  id: "mfo",
  name: "МФО Витрина",
  topicFile: "titles_mfo.txt",
  promptName: "mfo-article",
  credentialKeys: {
    storeUrl: "SUPABASE_URL",
    storeKey: "SUPABASE_SERVICE_ROLE_KEY",
    siteUrl: "SITE_URL",
    revalidateSecret: "REVALIDATE_SECRET",
  },
  defaultAuthor: "Редакция МФО Витрина",
  authorPool: [],
  allowedCategories: [
    "Инструкции",
    "Акции",
    "Требования",
    "Кредитная история",
    "Сравнение",
    "Советы",
    "Обзоры",
    "Личный опыт",
    "Юридические",
  ],
  defaultCategory: "Советы",
  fieldMapping: {
    title: "title",
    slug: "slug",
    excerpt: "excerpt",
    content: "content",
    category: "category",
    tags: "tags",
    author: "author",
    read_time: "read_time",
    meta_title: "meta_title",
    meta_description: "meta_description",
    seo_keywords: "seo_keywords",
  },
};

const HR_SITE: SiteConfig = {
  id: "hr",
  name: "Rabotaify",
  topicFile: "titles_hr.txt",
  promptName: "hr-article",
  credentialKeys: {
    storeUrl: "HR_SUPABASE_URL",
    storeKey: "HR_SUPABASE_SERVICE_ROLE_KEY",
    siteUrl: "HR_SITE_URL",
    revalidateSecret: "HR_REVALIDATE_SECRET",
  },
  defaultAuthor: null,
  authorPool: [
    { name: "Иван Маслаков", role: "IT-рекрутер", categories: ["Собеседования", "Поиск работы"] },
    {
      name: "Анна Ковалёва",
      role: "Карьерный консультант",
      categories: ["Зарплаты", "Soft skills", "Менеджмент", "Удалённая работа", "Фриланс"],
    },
    {
      name: "Дмитрий Соколов",
      role: "Разработчик",
      categories: ["Программирование", "Data Science", "DevOps", "Дизайн", "Образование"],
    },
  ],
  allowedCategories: [
    "IT и карьера",
    "Зарплаты",
    "Поиск работы",
    "Собеседования",
    "Удалённая работа",
    "Образование",
    "Фриланс",
    "Soft skills",
    "Программирование",
    "Data Science",
    "DevOps",
    "Дизайн",
    "Менеджмент",
  ],
  defaultCategory: "IT и карьера",
  fieldMapping: {
    title: "title",
    slug: "slug",
    excerpt: "excerpt",
    content: "content",
    category: "category_name",
    category_slug: "category_slug",
    category_icon: "category_icon",
    tags: "tags",
    author: "author_name",
    read_time: "reading_time",
  },
  categoryIcons: {
    "IT и карьера": "💻",
    Зарплаты: "💰",
    "Поиск работы": "📄",
    Собеседования: "🎯",
    "Удалённая работа": "🏠",
    Образование: "📚",
    Фриланс: "💼",
    "Soft skills": "🤝",
    Программирование: "⌨️",
    "Data Science": "📊",
    DevOps: "⚙️",
    Дизайн: "🎨",
    Менеджмент: "📋",
  },
  fallbackIcon: "📝",
};

function assertSiteConfig(site: SiteConfig): void {
  if (!site.allowedCategories.includes(site.defaultCategory)) {
    throw new ConfigError(
      `site ${site.id}: default category '${site.defaultCategory}' is not an allowed category`,
    );
  }
  if (site.defaultAuthor === null && site.authorPool.length === 0) {
    throw new ConfigError(`site ${site.id}: no default author and an empty author pool`);
  }
}

function freezeSite(site: SiteConfig): SiteConfig {
  Object.freeze(site.allowedCategories);
  Object.freeze(site.authorPool);
  Object.freeze(site.fieldMapping);
  Object.freeze(site.credentialKeys);
  if (site.categoryIcons) {
    Object.freeze(site.categoryIcons);
  }
  return Object.freeze(site);
}

export function buildSiteRegistry(sites: SiteConfig[]): ReadonlyMap<string, SiteConfig> {
  const registry = new Map<string, SiteConfig>();
  for (const site of sites) {
    assertSiteConfig(site);
    registry.set(site.id, freezeSite(site));
  }
  return registry;
}

const REGISTRY = buildSiteRegistry([MFO_SITE, HR_SITE]);

export function isSiteId(value: string): value is SiteId {
  return SITE_IDS.some((id) => id === value);
}

export function listSiteIds(): SiteId[] {
  return [...SITE_IDS];
}

export function getSiteConfig(siteId: string): SiteConfig {
  const site = REGISTRY.get(siteId);
  if (!site) {
    throw new UnknownSiteError(siteId);
  }
  return site;
}

export function resolveSiteIds(selector: string): SiteId[] {
  if (selector === "all") {
    return listSiteIds();
  }
  return [getSiteConfig(selector).id];
}

function stripQuotes(value: string): string {
  return value.trim().replace(/^["']+|["']+$/g, "");
}

export function resolveSiteCredentials(site: SiteConfig, env: AppEnv): SiteCredentials {
  const storeUrl = env[site.credentialKeys.storeUrl];
  const storeKey = env[site.credentialKeys.storeKey];
  const siteUrl = env[site.credentialKeys.siteUrl];
  const revalidateSecret = env[site.credentialKeys.revalidateSecret];

  return {
    storeUrl: storeUrl ? stripQuotes(storeUrl).replace(/\/+$/, "") : null,
    storeKey: storeKey ?? null,
    siteUrl: siteUrl ? stripQuotes(siteUrl).replace(/\/+$/, "") : DEFAULT_SITE_URL,
    revalidateSecret: revalidateSecret ?? null,
  };
}

export function selectAuthor(
  site: SiteConfig,
  category: string | null,
  random: () => number = Math.random,
): AuthorProfile | { name: string; role: null } {
  if (site.defaultAuthor !== null) {
    return { name: site.defaultAuthor, role: null };
  }

  if (category) {
    const preferred = site.authorPool.find((author) => author.categories.includes(category));
    if (preferred) {
      return preferred;
    }
  }

  const index = Math.min(site.authorPool.length - 1, Math.floor(random() * site.authorPool.length));
  return site.authorPool[index];
}
