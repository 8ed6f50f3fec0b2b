export type { ExecutorSchema } from './executorSchema';
export { toExecutorSchema } from './toExecutorSchema';
