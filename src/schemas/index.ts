// Input schemas
export { GrepSearchInputSchema } from './inputs/search.js';

// Output schemas
export { GrepMatchSchema, GrepSearchOutputSchema } from './outputs/search.js';
