/** @module CLI Commands */
export { depAddCommand, dependentsCommand, depRemoveCommand, depsCommand } from './deps'
export { eventsCommand, sessionEndCommand, sessionsCommand } from './history'
export {
  closeCommand,
  createCommand,
  type CreateCommandOptions,
  listCommand,
  type ListCommandOptions,
  showCommand,
  updateCommand,
  type UpdateCommandOptions,
} from './issue'
export { type OutputOptions, report } from './output'
export { blockedCommand, readyCommand } from './schedule'
