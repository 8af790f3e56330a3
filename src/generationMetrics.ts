import { FailureReason } from './errors'

export interface GenerationStats {
  totalRequests: number
  successfulRequests: number
  failedRequests: number
  successRate: number
  averageResponseTimeMs: number
  failuresByReason: Record<FailureReason, number>
}

const emptyFailures = (): Record<FailureReason, number> => ({
  network: 0,
  timeout: 0,
  rate_limit: 0,
  schema_violation: 0,
  provider_rejected: 0,
  cancelled: 0
})

// Contadores por tentativa (não por leitura): 3 tentativas = 3 requests
export class GenerationMetrics {
  private total = 0
  private successful = 0
  private responseTimeSum = 0
  private failures = emptyFailures()

  recordSuccess(responseTimeMs: number) {
    this.total++
    this.successful++
    this.responseTimeSum += responseTimeMs
  }

  recordFailure(reason: FailureReason, responseTimeMs: number) {
    this.total++
    this.failures[reason]++
    this.responseTimeSum += responseTimeMs
  }

  snapshot(): GenerationStats {
    const failed = this.total - this.successful
    return {
      totalRequests: this.total,
      successfulRequests: this.successful,
      failedRequests: failed,
      successRate: this.total > 0 ? Math.round((this.successful / this.total) * 10_000) / 100 : 0,
      averageResponseTimeMs: this.total > 0 ? Math.round(this.responseTimeSum / this.total) : 0,
      failuresByReason: { ...this.failures }
    }
  }
}
