export * from './progress';
export { mirrorProgressToStore } from './taskMirror';
