import pc from 'picocolors'

import type { Recommendation } from '../types/recommendation'

/**
 * Prints recommended global tags followed by the advisory notes.
 *
 * Warnings go to stderr, everything else to stdout.
 *
 * @param recommendation - Composed recommendation.
 */
export function printRecommendation(recommendation: Recommendation): void {
  console.info(pc.cyan('\nRecommended global tags:\n'))
  for (let [index, tag] of recommendation.tags.entries()) {
    console.info(`  ${pc.gray(`${index + 1}.`)} ${tag}`)
  }

  if (recommendation.release) {
    console.info(`\nSuggested release: ${pc.green(recommendation.release)}`)
  }

  let notes = recommendation.message.split('\n').filter(Boolean)
  if (notes.length > 0) {
    console.info('')
  }
  for (let note of notes) {
    if (note.startsWith('WARNING:')) {
      console.warn(pc.yellow(`⚠️  ${note}`))
    } else {
      console.info(pc.gray(note))
    }
  }
}
