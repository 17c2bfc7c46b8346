export enum Criterion {
  LEXICAL_RESOURCE = 'lexicalResource',
  GRAMMATICAL_RANGE = 'grammaticalRange',
  COHERENCE = 'coherence',
  TASK_ACHIEVEMENT = 'taskAchievement',
}

export enum ReviewOutcome {
  CORRECT = 'correct',
  WRONG = 'wrong',
}

export enum BandDescriptor {
  EXPERT = 'Expert User',
  VERY_GOOD = 'Very Good User',
  GOOD = 'Good User',
  COMPETENT = 'Competent User',
  MODEST = 'Modest User',
  LIMITED = 'Limited User',
}
