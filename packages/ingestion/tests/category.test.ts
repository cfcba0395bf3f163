import { describe, it, expect } from 'vitest';
import { JOB_CATEGORIES, inferCategory, isJobCategory } from '../src/category.js';

describe('inferCategory', () => {
  it.each([
    ['Machine Learning Engineer', 'Machine Learning'],
    ['AI Engineer Intern', 'Machine Learning'],
    ['Data Scientist', 'Data Science'],
    ['Senior Data Analyst', 'Data Science'],
    ['Product Manager Intern', 'Product Management'],
    ['Site Reliability Engineer', 'DevOps'],
    ['SRE II', 'DevOps'],
    ['Security Engineer', 'Security'],
    ['iOS Engineer', 'Mobile Development'],
    ['Front-End Developer', 'Frontend'],
    ['Backend Engineer', 'Backend'],
    ['Full Stack Developer', 'Full Stack'],
    ['Firmware Engineer Intern', 'Embedded Systems'],
    ['Gameplay Programmer', 'Game Development'],
    ['Product Designer', 'Design'],
    ['Software Engineer', 'Software Engineering'],
    ['Barista', 'Other'],
    ['', 'Other'],
  ])('%s -> %s', (role, category) => {
    expect(inferCategory(role)).toBe(category);
  });

  it('checks specific categories before the generic software bucket', () => {
    expect(inferCategory('Machine Learning Software Engineer')).toBe('Machine Learning');
    expect(inferCategory('Android Software Developer')).toBe('Mobile Development');
  });

  it('does not match short keywords inside other words', () => {
    expect(inferCategory('HTML Engineer')).toBe('Software Engineering');
    expect(inferCategory('Linux Engineer')).toBe('Software Engineering');
    expect(inferCategory('Biostatistics Analyst')).toBe('Other');
  });

  it('exposes the fixed taxonomy', () => {
    expect(JOB_CATEGORIES).toHaveLength(14);
    expect(isJobCategory('Design')).toBe(true);
    expect(isJobCategory('Daily List')).toBe(false);
  });
});
