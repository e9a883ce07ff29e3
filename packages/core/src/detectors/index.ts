export { createTextDocument, splitWords, splitSentences, splitParagraphs, tokenize, countEmoji } from './text-document.js';
export type { TextDocument } from './text-document.js';
export { BaseDetector } from './base-detector.js';
export type { Detector, DetectorOutput } from './base-detector.js';
export { FrequencyDetector, countSubstring, countTokenSequence } from './frequency-detector.js';
export { RegexDetector, countMatches } from './regex-detector.js';
export { StructuralDetector } from './structural-detector.js';
export { LinguisticDetector } from './linguistic-detector.js';
export { DetectorSet, createDetector } from './detector-set.js';
export { mean, sampleStdDev, invertedVariation, ratePer } from './statistics.js';
