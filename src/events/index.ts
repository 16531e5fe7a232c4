/**
 * pagewise - Events Domain
 */

export { createEmitter, type Emitter } from "./emitter";

export {
  createChannel,
  syncScheduler,
  microtaskScheduler,
  type Channel,
  type ChannelConfig,
  type Scheduler,
} from "./channel";
