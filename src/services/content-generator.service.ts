/**
 * Placeholder card content generator.
 *
 * Deterministic text per card type; stands in for a real generation
 * backend. Unknown types get a generic template instead of an error,
 * though the request layer never passes one through.
 */

import type { CardType } from '../core/card-types.js';

export type ContentGenerator = (topicName: string, cardType: CardType | string) => string;

export const generateCardContent: ContentGenerator = (topicName, cardType) => {
  switch (cardType) {
    case 'flashcard':
      return `Q: What is ${topicName}?\nA: This is a simple explanation of ${topicName}.`;
    case 'summary':
      return `Summary for ${topicName}: this is a short high-level summary.`;
    case 'quiz':
      return `Quiz question about ${topicName}: write one key concept related to it.`;
    case 'task':
      return `Task for ${topicName}: perform a small exercise that uses this topic in practice.`;
    case 'usecase':
      return `Use case for ${topicName}: describe when and why you would use ${topicName}.`;
    case 'mindmap':
      return `Mindmap structure for ${topicName}: main idea -> subtopic A, subtopic B, subtopic C.`;
    default:
      return `Generic content for ${topicName} (type: ${cardType}).`;
  }
};
