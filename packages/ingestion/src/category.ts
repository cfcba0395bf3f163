import { keywordPattern } from './patterns.js';

export const JOB_CATEGORIES = [
  'Software Engineering',
  'Data Science',
  'Machine Learning',
  'Product Management',
  'Design',
  'DevOps',
  'Security',
  'Mobile Development',
  'Frontend',
  'Backend',
  'Full Stack',
  'Embedded Systems',
  'Game Development',
  'Other',
] as const;

export type JobCategory = (typeof JOB_CATEGORIES)[number];

interface CategoryRule {
  readonly category: JobCategory;
  readonly keywords: readonly string[];
}

// Specific before broad: "Machine Learning Engineer" must not land in the generic bucket.
const RULES: readonly CategoryRule[] = [
  { category: 'Machine Learning', keywords: ['machine learning', 'ml engineer', 'ai engineer'] },
  { category: 'Data Science', keywords: ['data scien', 'data analyst'] },
  { category: 'Product Management', keywords: ['product manager', 'product management'] },
  { category: 'DevOps', keywords: ['devops', 'site reliability', 'sre', 'platform engineer'] },
  { category: 'Security', keywords: ['security', 'cybersecurity', 'infosec'] },
  { category: 'Mobile Development', keywords: ['ios', 'android', 'mobile'] },
  { category: 'Frontend', keywords: ['frontend', 'front-end', 'front end', 'ui engineer'] },
  { category: 'Backend', keywords: ['backend', 'back-end', 'back end'] },
  { category: 'Full Stack', keywords: ['full stack', 'fullstack', 'full-stack'] },
  { category: 'Embedded Systems', keywords: ['embedded', 'firmware', 'hardware'] },
  { category: 'Game Development', keywords: ['game', 'unity', 'unreal'] },
  { category: 'Design', keywords: ['design', 'ux', 'ui/ux'] },
  { category: 'Software Engineering', keywords: ['software', 'engineer', 'developer', 'programmer'] },
];

// Keywords match at the start of a word, so "HTML Engineer" is not "ml engineer".
const COMPILED_RULES = RULES.map((rule) => ({
  category: rule.category,
  patterns: rule.keywords.map((keyword) => keywordPattern(keyword, { wordStart: true })),
}));

/**
 * Map a free-text role title onto the fixed category taxonomy.
 */
export function inferCategory(role: string): JobCategory {
  const lowered = role.toLowerCase();

  for (const { category, patterns } of COMPILED_RULES) {
    if (patterns.some((pattern) => pattern.test(lowered))) {
      return category;
    }
  }

  return 'Other';
}

export function isJobCategory(value: string): value is JobCategory {
  return JOB_CATEGORIES.some((category) => category === value);
}
