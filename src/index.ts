export { ConversationStream } from "./audio/conversation-stream";
export { RawPcmFileSink, RawPcmFileSource } from "./audio/pcm-file";
export { ProcessAudioSink, ProcessAudioSource } from "./audio/process-audio";
export { loadAccessToken } from "./auth/credentials";
export { ConfigurationManager } from "./config/configuration-manager";
export { resolveDeviceIdentity } from "./config/device-config-store";
export { runConversation, type TurnTrigger } from "./conversation/conversation-loop";
export { ConversationSession, type RunTurnOptions } from "./conversation/conversation-session";
export { ConversationState } from "./conversation/conversation-state";
export { RequestEncoder } from "./conversation/request-encoder";
export { ResponseStateMachine } from "./conversation/response-state-machine";
export { BoundedChannel, ChannelClosedError } from "./core/bounded-channel";
export * from "./core/errors";
export { Logger, MemoryLogSink, StreamLogSink, type LogLevel } from "./core/logger";
export { RetryPolicy, classifyTransportFailure } from "./core/retry/retry-policy";
export { RuntimeContext } from "./core/runtime-context";
export { DeviceActionDispatcher, DeviceActionDispatcherBuilder } from "./device/device-action-dispatcher";
export { registerDefaultHandlers } from "./device/handlers";
export { HtmlFileDisplay, type ScreenOutDisplay } from "./display/screen-out-display";
export { describeError, toAssistantError } from "./helpers/error/envelope";
export type { AssistantTransport } from "./transport/assistant-transport";
export { WebSocketAssistantTransport } from "./transport/websocket-transport";
export type * from "./types/assist-messages";
export type * from "./types/audio";
export type * from "./types/configuration";
export type * from "./types/conversation";
export type * from "./types/device-action";
