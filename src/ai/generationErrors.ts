/**
 * Maps failures of the generation backend to coarse, operator-readable categories
 */

import { APIConnectionError, APIConnectionTimeoutError } from 'openai';

export type FailureCategory =
  | 'quota'
  | 'rate_limit'
  | 'timeout'
  | 'connection'
  | 'auth'
  | 'rejected'
  | 'service'
  | 'storage'
  | 'unknown';

export interface ClassifiedFailure {
  category: FailureCategory;
  message: string;
}

export const FAILURE_LABELS: Record<FailureCategory, string> = {
  quota: 'cota esgotada',
  rate_limit: 'limite de requisições',
  timeout: 'tempo esgotado',
  connection: 'falha de conexão',
  auth: 'credenciais inválidas',
  rejected: 'requisição recusada',
  service: 'erro do serviço de IA',
  storage: 'erro no banco de dados',
  unknown: 'erro inesperado',
};

const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
]);

const readProperty = (error: unknown, key: 'status' | 'code'): unknown =>
  typeof error === 'object' && error !== null && key in error
    ? Reflect.get(error, key)
    : undefined;

export function classifyGenerationError(error: unknown): ClassifiedFailure {
  const status = readProperty(error, 'status');
  const code = readProperty(error, 'code');
  const message = error instanceof Error ? error.message : String(error);

  if (
    error instanceof APIConnectionTimeoutError ||
    (error instanceof Error && error.name === 'AbortError') ||
    code === 'ETIMEDOUT'
  ) {
    return {
      category: 'timeout',
      message: 'A API de IA não respondeu a tempo.',
    };
  }

  if (
    error instanceof APIConnectionError ||
    (typeof code === 'string' && NETWORK_ERROR_CODES.has(code))
  ) {
    return {
      category: 'connection',
      message: 'Não foi possível conectar à API de IA.',
    };
  }

  if (typeof status === 'number') {
    if (status === 429) {
      return code === 'insufficient_quota' || /quota/i.test(message)
        ? {
            category: 'quota',
            message: 'A cota da API de IA está esgotada. Verifique o plano e o faturamento.',
          }
        : {
            category: 'rate_limit',
            message: 'Limite de requisições da API de IA atingido. Tente novamente em alguns minutos.',
          };
    }
    if (status === 401 || status === 403) {
      return {
        category: 'auth',
        message: 'A chave da API de IA é inválida ou não tem permissão.',
      };
    }
    if (status >= 500) {
      return {
        category: 'service',
        message: `A API de IA respondeu com erro (status ${status}).`,
      };
    }
    return {
      category: 'rejected',
      message: `A API de IA recusou a requisição (status ${status}).`,
    };
  }

  return {
    category: 'unknown',
    message: 'Erro inesperado ao gerar o resumo.',
  };
}
