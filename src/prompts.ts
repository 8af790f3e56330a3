import fs from 'fs'
import path from 'path'
import YAML from 'yaml'
import { z } from 'zod'
import { ConfigError } from './errors'
import { ReadingKind } from './types'

export interface PromptTemplate {
  readonly system: string
  readonly user: string
}

export type PromptTemplates = Readonly<Record<ReadingKind, PromptTemplate>>

export const DEFAULT_PROMPTS_FILE = path.join(process.cwd(), 'config', 'prompts.yaml')

const TemplateSchema = z.object({
  system: z.string().trim().min(1),
  user: z.string().trim().min(1)
})

const TemplatesSchema = z.object({
  basic: TemplateSchema,
  premium: TemplateSchema,
  message: TemplateSchema
})

export function loadPrompts(file: string = DEFAULT_PROMPTS_FILE): PromptTemplates {
  const result = TemplatesSchema.safeParse(YAML.parse(fs.readFileSync(file, 'utf8')))
  if (!result.success) {
    throw new ConfigError(result.error.issues.map(i => `${path.basename(file)} ${i.path.join('.')}: ${i.message}`))
  }
  const { basic, premium, message } = result.data
  return Object.freeze({
    basic: Object.freeze(basic),
    premium: Object.freeze(premium),
    message: Object.freeze(message)
  })
}

// Substituição literal de {chave}; chaves JSON dos exemplos ({"card": ...}) ficam intactas
export function renderPrompt(template: string, vars: Readonly<Record<string, string>> = {}): string {
  return template.replace(/\{(\w+)\}/g, (match, key: string) => (key in vars ? vars[key] : match))
}
