// 分类：固定集合，slug 同时用于 URL 与 writings.category 列

export const CATEGORY_SLUGS = ["poemas", "cuentos", "escritos"] as const;

export type CategorySlug = (typeof CATEGORY_SLUGS)[number];

export interface CategoryInfo {
  name: string;
  icon: string;
  description: string;
}

export const CATEGORIES: Record<CategorySlug, CategoryInfo> = {
  poemas: {
    name: "Poemas",
    icon: "📝",
    description: "Rimas, versos y sentimientos en palabras.",
  },
  cuentos: {
    name: "Cuentos",
    icon: "📖",
    description: "Historias, aventuras y personajes increíbles.",
  },
  escritos: {
    name: "Escritos",
    icon: "💡",
    description: "Ideas, notas, pensamientos y todo lo demás.",
  },
};

export function isCategorySlug(s: unknown): s is CategorySlug {
  return CATEGORY_SLUGS.some((slug) => slug === s);
}
