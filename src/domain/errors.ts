// src/domain/errors.ts
//
// Taxonomia de erros do digest.
// - TransportError: chamada ao Notion falhou (rede, HTTP != 2xx, resposta fora do schema)
// - NotFoundError: consulta de um bucket de semana que não foi populado
// - ValidationError: política de semana / data âncora inválida
// - ConfigError: variável de ambiente obrigatória ausente

export class DigestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class TransportError extends DigestError {
  /** HTTP status; 0 quando a falha foi de rede / timeout / protocolo. */
  readonly status: number;

  constructor(status: number, message: string) {
    super(`Notion API error ${status}: ${message}`);
    this.status = status;
  }
}

export class NotFoundError extends DigestError {
  readonly week: number;

  constructor(week: number) {
    super(`Nenhuma página encontrada para a semana ${week}`);
    this.week = week;
  }
}

export class ValidationError extends DigestError {}

export class ConfigError extends DigestError {}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
