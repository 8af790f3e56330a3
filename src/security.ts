/**
 * Funções de sanitização e validação para entradas vindas do transporte de chat
 */

export const MAX_CONTEXT_LENGTH = 200

// Validar user ID (alfanumérico + hífen + underscore, ids numéricos do Telegram incluídos)
export function validateUserId(userId: unknown): userId is string {
  if (typeof userId !== 'string') return false
  if (userId.length < 1 || userId.length > 64) return false
  return /^[a-zA-Z0-9_-]+$/.test(userId)
}

// Normaliza o identificador recebido no body (string ou número) para a chave do ledger
export function normalizeUserId(input: unknown): string | null {
  const candidate = typeof input === 'number' && Number.isSafeInteger(input) ? String(input) : input
  return validateUserId(candidate) ? candidate : null
}

// Contexto livre (ex.: data de nascimento) vai para o prompt: só limpamos, sem validar semântica
export function sanitizeContext(input: unknown, maxLength: number = MAX_CONTEXT_LENGTH): string {
  if (typeof input !== 'string') return ''
  return input
    .replace(/[\u0000-\u001F\u007F]/g, ' ') // Remove caracteres de controle
    .replace(/\s+/g, ' ')
    .trim()
    .substring(0, maxLength)
}

// Escapar conteúdo para logs (previne log injection)
export function sanitizeForLog(input: unknown): string {
  const text = typeof input === 'string' ? input : JSON.stringify(input) ?? String(input)
  return text
    .replace(/[\r\n]/g, ' ') // Remove quebras de linha
    .replace(/[^\x20-\x7E]/g, '?') // Remove caracteres não-ASCII
    .substring(0, 500) // Limita tamanho
}
