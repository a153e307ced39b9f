/**
 * Settings Schema
 *
 * Named settings read by the parser and the HTML backend. Values are validated
 * once; the alias table and render context are built from the result during
 * setup and never change afterwards.
 */

import { z } from 'zod';

/**
 * Image formats the diagram tool can produce
 */
export const imageFormatEnum = z.enum(['png', 'svg', 'jpg', 'gif']);

export type ImageFormat = z.infer<typeof imageFormatEnum>;

export const listMarkerEnum = z.enum(['-', '*', '+']);

export const docConfigSchema = z.object({
  /** `name=value` or `name{n}=value` */
  aliases: z.array(z.string()).default([]),
  autolinkSupport: z.boolean().default(true),
  internalDocs: z.boolean().default(false),
  htmlFileExtension: z.string().regex(/^\.[A-Za-z0-9]+$/, 'extension must start with a dot').default('.html'),
  useMathJax: z.boolean().default(false),
  dotImageFormat: imageFormatEnum.default('png'),
  externalLinksInWindow: z.boolean().default(false),
  /** External tag file name -> base URL of its documentation */
  tagFileLocations: z.record(z.string()).default({}),
  markdownListMarkers: z.array(listMarkerEnum).default(['-', '*', '+']),
  tabSize: z.number().int().min(1).max(16).default(4),
  /** Directory the HTML pages and diagram images are written to */
  outputDirectory: z.string().default('html'),
});

export type DocConfig = z.infer<typeof docConfigSchema>;

/**
 * Raised for settings that fail validation; one line per offending path
 */
export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.join('\n')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Validate raw settings and fill in defaults
 */
export function loadDocConfig(raw: unknown = {}): DocConfig {
  const result = docConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(result.error.errors.map(e => `${e.path.join('.') || '<root>'}: ${e.message}`));
  }
  return result.data;
}
