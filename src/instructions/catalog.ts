import { readFile } from 'node:fs/promises';
import { join, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { InvalidUseCaseError } from '../errors.js';

const __dirname = dirname(fileURLToPath(import.meta.url));

/** Bundled documents live at the package root, beside src/ and dist/. */
export const DEFAULT_INSTRUCTIONS_DIR = join(__dirname, '../..', 'instructions');

export const USE_CASES = ['data', 'ingest', 'pipeline', 'repair', 'test', 'sdk'] as const;

export type UseCase = (typeof USE_CASES)[number];

/** Older callers ask for the ingestion guide as 'wap'. */
const USE_CASE_ALIASES: ReadonlyMap<string, UseCase> = new Map<string, UseCase>([['wap', 'ingest']]);

function isUseCase(value: string): value is UseCase {
  return (USE_CASES as readonly string[]).includes(value);
}

/**
 * Maps a caller-supplied key onto the closed use-case set. Matching ignores
 * case and surrounding whitespace.
 */
export function parseUseCase(raw: string): UseCase {
  const key = raw.trim().toLowerCase();
  if (isUseCase(key)) {
    return key;
  }
  const alias = USE_CASE_ALIASES.get(key);
  if (alias) {
    return alias;
  }
  throw new InvalidUseCaseError(raw, USE_CASES);
}

export class InstructionCatalog {
  private readonly documents: ReadonlyMap<UseCase, string>;

  constructor(documents: Record<UseCase, string>) {
    for (const useCase of USE_CASES) {
      if (documents[useCase].trim().length === 0) {
        throw new Error(`Instruction document for '${useCase}' is empty`);
      }
    }
    this.documents = new Map(USE_CASES.map((useCase) => [useCase, documents[useCase]] as const));
  }

  get useCases(): readonly UseCase[] {
    return USE_CASES;
  }

  /** Returns the document for `useCase` verbatim; unknown keys throw. */
  getInstructions(useCase: string): string {
    const key = parseUseCase(useCase);
    const document = this.documents.get(key);
    if (document === undefined) {
      throw new InvalidUseCaseError(useCase, USE_CASES);
    }
    return document;
  }
}

/**
 * Reads every instruction document once. A missing file aborts startup
 * rather than surfacing later as a failed tool call.
 */
export async function loadInstructionCatalog(dir: string = DEFAULT_INSTRUCTIONS_DIR): Promise<InstructionCatalog> {
  const entries = await Promise.all(
    USE_CASES.map(async (useCase) => {
      const path = join(dir, `${useCase}.md`);
      try {
        return [useCase, await readFile(path, 'utf-8')] as const;
      } catch (error) {
        throw new Error(
          `Failed to load instructions for '${useCase}' from ${path}: ${error instanceof Error ? error.message : 'Unknown error'}`
        );
      }
    })
  );

  const documents: Record<UseCase, string> = {
    data: '',
    ingest: '',
    pipeline: '',
    repair: '',
    test: '',
    sdk: '',
  };
  for (const [useCase, text] of entries) {
    documents[useCase] = text;
  }

  return new InstructionCatalog(documents);
}
