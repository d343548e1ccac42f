export { topics, type Topic } from './topics.js';
export { cards, type Card } from './cards.js';
