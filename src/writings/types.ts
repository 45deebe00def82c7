/**
 * 文本条目：writings 表的一行
 * 时间字段为 ISO-8601 字符串（toISOString）
 */

import type { CategorySlug } from "./categories.js";

export interface Writing {
  id: number;
  category: CategorySlug;
  title: string;
  /** 富文本正文（HTML） */
  content: string;
  created_at: string;
  updated_at: string;
}

/** 表单提交的保存请求：无 id 为新建，有 id 为更新 */
export interface SaveWritingInput {
  id?: number;
  category: CategorySlug;
  title: string;
  content: string;
}

export const UNTITLED = "Sin título";
