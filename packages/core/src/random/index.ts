export { SeededRandom, pickOne, shuffled, createRandomSource } from './seeded-random.js';
