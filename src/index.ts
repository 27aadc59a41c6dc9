/**
 * The Application Programming Interface (API) is the collection of functions, classes and types offered by the
 * wordseed library.
 */
import * as wordseed from './wordseed.js';

export { wordseed };

export * from './wordseed.js';
