export { InMemoryEntityRepository } from './arena/in-memory-repository.js';
export { InMemoryArena, createInMemoryArena } from './arena/arena.js';
