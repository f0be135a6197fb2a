import { grammarModule } from './kinds/grammar.js'
import { listeningModule } from './kinds/listening.js'
import { readingModule } from './kinds/reading.js'
import { speakingModule } from './kinds/speaking.js'
import { writingModule } from './kinds/writing.js'
import type { ContentKind } from './types.js'

export const contentModules = {
  grammar: grammarModule,
  listening: listeningModule,
  reading: readingModule,
  speaking: speakingModule,
  writing: writingModule,
} satisfies Record<ContentKind, unknown>

/** URL segment a kind is mounted under, e.g. `writing-questions`. */
export function routeSegment(kind: ContentKind) {
  return `${kind}-questions`
}
