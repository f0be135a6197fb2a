import type { Database } from '@lingo/db'
import { grammarModule } from '../content/kinds/grammar.js'
import { listeningModule } from '../content/kinds/listening.js'
import { readingModule } from '../content/kinds/reading.js'
import { speakingModule } from '../content/kinds/speaking.js'
import { writingModule } from '../content/kinds/writing.js'
import { createGrammarRepository } from '../repositories/grammar-repository.js'
import { createListeningRepository } from '../repositories/listening-repository.js'
import { createReadingRepository } from '../repositories/reading-repository.js'
import { createSpeakingRepository } from '../repositories/speaking-repository.js'
import { createWritingRepository } from '../repositories/writing-repository.js'
import { createKindRuntime, type SharedInfrastructure } from './kind-runtime.js'

/** One runtime per content kind, all backed by Postgres and the shared cache and index. */
export function createContentRuntimes(db: Database, shared: SharedInfrastructure) {
  return {
    grammar: createKindRuntime(grammarModule, createGrammarRepository(db), shared),
    listening: createKindRuntime(listeningModule, createListeningRepository(db), shared),
    reading: createKindRuntime(readingModule, createReadingRepository(db), shared),
    speaking: createKindRuntime(speakingModule, createSpeakingRepository(db), shared),
    writing: createKindRuntime(writingModule, createWritingRepository(db), shared),
  }
}
