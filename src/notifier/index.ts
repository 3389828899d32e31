export {
  createMailSourceState,
  createNotifierState,
  runMailCycle,
  runRedditCycle,
  runFeedsCycle,
  runAllCycles,
} from "./orchestrator";
export type {
  NotifierDeps,
  NotifierState,
  MailSourceState,
  CycleResult,
  CycleStatus,
} from "./orchestrator";
