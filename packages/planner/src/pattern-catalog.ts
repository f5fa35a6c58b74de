/**
 * Pattern Catalog — Known retrieval-augmented execution patterns
 *
 * Each pattern carries its matching signals (intent keywords, file-type
 * hints), a fixed complexity score, a relative cost factor and the node
 * template the compiler expands into a DAG.
 *
 * Declaration order matters: it is the classifier's last tie-breaker.
 */

import { PATTERN_TYPES } from '@docweave/shared';
import type { PatternType } from '@docweave/shared';
import type { Pattern } from './types.js';

export const DEFAULT_PATTERN_TYPE: PatternType = 'simple_qa';

const PATTERNS: Record<PatternType, Pattern> = {
  // ─── Simple Q&A ─────────────────────────────────────────────────
  simple_qa: {
    type: 'simple_qa',
    name: 'Simple Q&A',
    description: 'Answer a direct question, grounding it in any supplied documents',
    intentKeywords: [
      'what is', 'what are', 'who is', 'who are', 'when did', 'where is',
      'how does', 'how many', 'explain', 'define', 'question', 'answer',
    ],
    fileTypeHints: ['.txt', '.md', '.pdf', '.docx'],
    complexityScore: 2,
    costFactor: 1.0,
    streaming: false,
    requiresFiles: false,
    template: [
      {
        key: 'extract',
        operation: 'extract',
        fanOut: 'per_file',
        inputs: [],
        instruction: 'Extract the passages from {file} relevant to: {query}',
      },
      {
        key: 'answer',
        operation: 'answer',
        fanOut: 'single',
        inputs: ['extract'],
        instruction: 'Answer the question "{query}" using the extracted passages ({inputs}).',
      },
    ],
  },

  // ─── Comparative Analysis ───────────────────────────────────────
  multi_document_compare: {
    type: 'multi_document_compare',
    name: 'Comparative Analysis',
    description: 'Extract from each document in parallel, compare the extractions, synthesize a verdict',
    intentKeywords: [
      'compare', 'comparison', 'contrast', 'difference', 'versus', ' vs ', 'similarities',
    ],
    fileTypeHints: ['.pdf', '.docx', '.xlsx', '.csv'],
    complexityScore: 6,
    costFactor: 2.5,
    streaming: false,
    requiresFiles: true,
    template: [
      {
        key: 'extract',
        operation: 'extract',
        fanOut: 'per_file',
        inputs: [],
        instruction: 'Extract the key facts, figures and claims from {file} that bear on: {query}',
      },
      {
        key: 'compare',
        operation: 'compare',
        fanOut: 'single',
        inputs: ['extract'],
        instruction: 'Compare the extracted content from {inputs}. Identify agreements, differences and gaps relevant to: {query}',
      },
      {
        key: 'synthesize',
        operation: 'synthesize',
        fanOut: 'single',
        inputs: ['compare'],
        instruction: 'Write the final answer to "{query}" from the comparison in {inputs}.',
      },
    ],
  },

  // ─── Research Synthesis ─────────────────────────────────────────
  research_synthesis: {
    type: 'research_synthesis',
    name: 'Research Synthesis',
    description: 'Extract and summarize each source independently, then synthesize the themes across sources',
    intentKeywords: [
      'synthesize', 'synthesis', 'research', 'literature', 'findings', 'themes',
      'multiple sources', 'across sources', 'combine',
    ],
    fileTypeHints: ['.pdf', '.txt', '.md'],
    complexityScore: 7,
    costFactor: 3.0,
    streaming: false,
    requiresFiles: true,
    template: [
      {
        key: 'extract',
        operation: 'extract',
        fanOut: 'per_file',
        inputs: [],
        instruction: 'Extract the methods, results and conclusions in {file} that relate to: {query}',
      },
      {
        key: 'summarize',
        operation: 'summarize',
        fanOut: 'per_file',
        inputs: ['extract'],
        instruction: 'Summarize the extraction {inputs} from source {file_index} in the context of: {query}',
      },
      {
        key: 'synthesize',
        operation: 'synthesize',
        fanOut: 'single',
        inputs: ['summarize'],
        instruction: 'Synthesize the common themes, tensions and open questions across {inputs} for: {query}',
      },
    ],
  },

  // ─── Fact Checking ──────────────────────────────────────────────
  fact_checking: {
    type: 'fact_checking',
    name: 'Fact Checking',
    description: 'Pull checkable claims from each document, verify them, classify the verdicts and report',
    intentKeywords: [
      'verify', 'fact', 'claim', 'accurate', 'accuracy', 'validate', 'true or false', 'evidence',
    ],
    fileTypeHints: ['.pdf', '.docx', '.txt', '.html'],
    complexityScore: 5,
    costFactor: 2.0,
    streaming: false,
    requiresFiles: true,
    template: [
      {
        key: 'extract',
        operation: 'extract',
        fanOut: 'per_file',
        inputs: [],
        instruction: 'List every checkable claim in {file} related to: {query}',
      },
      {
        key: 'verify',
        operation: 'verify',
        fanOut: 'per_file',
        inputs: ['extract'],
        instruction: 'Check each claim from {inputs} for supporting or contradicting evidence in {file}.',
      },
      {
        key: 'classify',
        operation: 'classify',
        fanOut: 'single',
        inputs: ['verify'],
        instruction: 'Classify every claim checked in {inputs} as supported, contradicted or unverifiable.',
      },
      {
        key: 'report',
        operation: 'synthesize',
        fanOut: 'single',
        inputs: ['classify'],
        instruction: 'Write a fact-check report for "{query}" from the verdicts in {inputs}.',
      },
    ],
  },

  // ─── Summarize Then Extract ─────────────────────────────────────
  summarize_then_extract: {
    type: 'summarize_then_extract',
    name: 'Summarize Then Extract',
    description: 'Summarize each document in parallel, then extract the requested points from the summaries',
    intentKeywords: [
      'summarize', 'summary', 'overview', 'key points', 'highlights', 'extract', 'tl;dr',
    ],
    fileTypeHints: ['.pdf', '.docx', '.txt', '.pptx'],
    complexityScore: 4,
    costFactor: 1.6,
    streaming: true,
    requiresFiles: true,
    template: [
      {
        key: 'summarize',
        operation: 'summarize',
        fanOut: 'per_file',
        inputs: [],
        instruction: 'Summarize {file}, keeping whatever matters for: {query}',
      },
      {
        key: 'extract',
        operation: 'extract',
        fanOut: 'single',
        inputs: ['summarize'],
        instruction: 'From the summaries {inputs}, extract the points requested by: {query}',
      },
    ],
  },

  // ─── Iterative Refinement ───────────────────────────────────────
  iterative_refine: {
    type: 'iterative_refine',
    name: 'Iterative Refinement',
    description: 'Draft from the sources, review the draft, then produce a refined final version',
    intentKeywords: [
      'refine', 'improve', 'iterate', 'draft', 'polish', 'rewrite', 'revise',
    ],
    fileTypeHints: ['.md', '.txt', '.docx'],
    complexityScore: 8,
    costFactor: 3.5,
    streaming: true,
    requiresFiles: true,
    template: [
      {
        key: 'extract',
        operation: 'extract',
        fanOut: 'per_file',
        inputs: [],
        instruction: 'Extract the material in {file} needed for: {query}',
      },
      {
        key: 'draft',
        operation: 'synthesize',
        fanOut: 'single',
        inputs: ['extract'],
        instruction: 'Write a first draft for "{query}" from {inputs}.',
      },
      {
        key: 'review',
        operation: 'verify',
        fanOut: 'single',
        inputs: ['draft'],
        instruction: 'Review the draft {inputs} for gaps, errors and unclear passages against: {query}',
      },
      {
        key: 'final',
        operation: 'refine',
        fanOut: 'single',
        inputs: ['draft', 'review'],
        instruction: 'Revise the draft using the review ({inputs}) into a final version for: {query}',
      },
    ],
  },
};

/**
 * All patterns in declaration order.
 */
export const PATTERN_CATALOG: readonly Pattern[] = PATTERN_TYPES.map(type => PATTERNS[type]);

export function getPattern(type: PatternType): Pattern {
  return PATTERNS[type];
}

export function getDefaultPattern(): Pattern {
  return PATTERNS[DEFAULT_PATTERN_TYPE];
}

/**
 * Position of a pattern in the catalog (declaration order).
 */
export function catalogIndex(type: PatternType): number {
  return PATTERN_TYPES.indexOf(type);
}
