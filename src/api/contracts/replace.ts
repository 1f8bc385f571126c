import { z } from 'zod';

const formText = z
  .string()
  .optional()
  .transform((value) => (value ?? '').trim());

/**
 * 替换请求的表单字段
 * @description `old_text` / `new_text` 为旧版页面使用的字段名；两端空白会被去掉
 */
export const ReplaceFormSchema = z
  .object({
    search: formText,
    replacement: formText,
    old_text: formText,
    new_text: formText,
  })
  .transform((form) => ({
    searchText: form.search || form.old_text,
    replacementText: form.replacement || form.new_text,
  }));

export type ReplaceForm = z.infer<typeof ReplaceFormSchema>;

/**
 * 健康检查响应
 */
export const HealthResponseSchema = z.object({
  status: z.literal('ok'),
  uptime: z.number().nonnegative(),
  activeWorkspaces: z.number().int().nonnegative(),
});

export type HealthResponse = z.infer<typeof HealthResponseSchema>;

/**
 * 支持格式列表响应
 */
export const FormatsResponseSchema = z.object({
  formats: z.array(
    z.object({
      format: z.enum(['pdf', 'csv', 'xml', 'xpt']),
      extension: z.string(),
      mimeType: z.string(),
      label: z.string(),
    }),
  ),
});

export type FormatsResponse = z.infer<typeof FormatsResponseSchema>;
