export {
  FrameEnvelopeSchema,
  createFrame,
  type Frame,
  type FrameEnvelope,
} from './frame';
export {
  ClientFrameSchema,
  parseClientFrame,
  type ClientFrame,
  type ClientFrameType,
  type ParseResult,
} from './envelope';
export { StoreKeys, Channels, FanoutEnvelopeSchema, type FanoutEnvelope } from './channels';
export * from './events';
