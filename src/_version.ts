/**
 * The current version of wordseed. Keep in step with `package.json`.
 */
export const version: string = '1.0.0';
