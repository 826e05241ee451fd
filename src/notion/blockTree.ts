// src/notion/blockTree.ts
//
// Monta a árvore de blocos de uma página a partir dos filhos paginados.
//
// Regras:
// - Falha ao listar os filhos do PRÓPRIO nó raiz => rejeita (nada parcial)
// - Falha ao listar os filhos de um descendente => loga, o bloco fica com
//   children=[] e entra no manifesto `failures`; irmãos seguem normalmente
// - maxDepth limita a descida: com maxDepth=0 só os filhos diretos voltam,
//   todos com children=[] mesmo se has_children=true (truncamento, não erro)
// - Tudo sequencial (sem Promise.all entre irmãos)

import { ValidationError, errorMessage } from "../domain/errors.js";
import type { Block, ContentStore } from "../domain/notion.js";
import { collectAllPages } from "./paginate.js";

/** Profundidade padrão abaixo dos filhos diretos. */
export const DEFAULT_MAX_DEPTH = 10;

export interface BranchFailure {
  blockId: string;
  // 1 = filho direto da raiz
  depth: number;
  error: unknown;
}

export interface BlockTree {
  blocks: Block[];
  failures: BranchFailure[];
}

export type BranchErrorReporter = (failure: BranchFailure) => void;

export interface FetchTreeOptions {
  onBranchError?: BranchErrorReporter;
}

function defaultBranchErrorReporter(failure: BranchFailure): void {
  console.warn(
    `⚠️ [blockTree] falha ao buscar filhos do bloco ${failure.blockId} ` +
      `(nível ${failure.depth}): ${errorMessage(failure.error)}`
  );
}

export function listChildren(store: ContentStore, nodeId: string): Promise<Block[]> {
  return collectAllPages((cursor) => store.fetchChildPage(nodeId, cursor), {
    label: `blocks:${nodeId}`,
  });
}

export async function fetchTree(
  store: ContentStore,
  nodeId: string,
  maxDepth: number = DEFAULT_MAX_DEPTH,
  options: FetchTreeOptions = {}
): Promise<BlockTree> {
  // o limite é o que segura estruturas cíclicas: precisa ser um número válido
  if (!Number.isFinite(maxDepth) || maxDepth < 0) {
    throw new ValidationError(`[blockTree] maxDepth inválido: ${maxDepth}`);
  }

  const report = options.onBranchError ?? defaultBranchErrorReporter;
  const failures: BranchFailure[] = [];

  const blocks = await materialize(store, nodeId, Math.floor(maxDepth), 1, report, failures);

  return { blocks, failures };
}

async function materialize(
  store: ContentStore,
  nodeId: string,
  remainingDepth: number,
  level: number,
  report: BranchErrorReporter,
  failures: BranchFailure[]
): Promise<Block[]> {
  // propaga: quem chamou decide se é fatal (raiz) ou isolado (descendente)
  const children = await listChildren(store, nodeId);

  for (const child of children) {
    child.children = [];
    if (!child.hasChildren || remainingDepth <= 0) continue;

    try {
      child.children = await materialize(store, child.id, remainingDepth - 1, level + 1, report, failures);
    } catch (err) {
      const failure: BranchFailure = { blockId: child.id, depth: level, error: err };
      failures.push(failure);
      report(failure);
    }
  }

  return children;
}
