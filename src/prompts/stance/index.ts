export { assessStancePrompt } from './assessStance';
export type { AssessStanceInput } from './assessStance';
