import { readFile } from 'node:fs/promises'
import { join } from 'node:path'

import { asRecord } from './env-config'

export type TemplateBindings = Record<string, unknown>

export interface TemplateRenderer {
  render: (templateName: string, bindings: TemplateBindings) => Promise<string>
}

export const resolvePath = (value: Record<string, unknown>, path: string) => {
  const parts = path
    .split('.')
    .map((part) => part.trim())
    .filter(Boolean)
  let cursor: unknown = value
  for (const part of parts) {
    const record = asRecord(cursor)
    if (!record) return null
    cursor = record[part]
  }
  return cursor ?? null
}

export const renderTemplate = (template: string, context: TemplateBindings) =>
  template.replace(/\{\{\s*([^}]+?)\s*\}\}/g, (_match, path) => {
    const value = resolvePath(context, String(path))
    if (value == null) return ''
    return typeof value === 'string' ? value : JSON.stringify(value)
  })

export const createFileTemplateRenderer = (templateDir: string): TemplateRenderer => {
  const cache = new Map<string, string>()

  const load = async (templateName: string) => {
    const cached = cache.get(templateName)
    if (cached !== undefined) return cached
    const template = await readFile(join(templateDir, templateName), 'utf8')
    cache.set(templateName, template)
    return template
  }

  return {
    render: async (templateName, bindings) => renderTemplate(await load(templateName), bindings),
  }
}
