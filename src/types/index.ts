export type ISODate = string
export type Id = string

export type {
  TaskDescriptor,
  TaskErrorInfo,
  TaskPayload,
  TaskRecord,
  TaskResult,
  TaskStatus,
  TaskType,
} from './tasks.js'
export { TASK_TYPES, TERMINAL_STATUSES, isTaskType, isTerminalStatus } from './tasks.js'
