/**
 * Scoring for judged notes
 */

export * from './wife.js'
export * from './grades.js'
export * from './ScoreKeeper.js'
