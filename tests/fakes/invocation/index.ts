export { ScriptedHandlerClient, type RecordedCall, type ScriptStep } from './scripted-handler-client.fake.js';
export { RecordingSleeper } from './recording-sleeper.fake.js';
export { SequentialBearerTokens } from './sequential-bearer-tokens.fake.js';
