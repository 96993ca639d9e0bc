export { classifyPath, classifyGraph, isDependencyAllowed } from './classifier.js';
export type { ClassifiedGraph, ClassifiedModule } from './types.js';
