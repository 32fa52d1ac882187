/**
 * Dialogue events and effects
 *
 * Producers (detector, recognizer, transport, player, caller) only ever
 * speak to the dialogue session through DialogueEvent. The transition
 * function answers with DialogueEffect commands for the session to run.
 */

import type { ProtocolOrderingError } from '../errors';
import type { ConversationState, InputMode, MessageRole, Utterance } from '../types';

// ============ Events ============

export type DialogueEvent =
  // Microphone and voice activity detector
  | { type: 'captureFailed'; error: Error }
  | { type: 'speechStart' }
  | { type: 'speechEnd' }
  | { type: 'speechCancelled' }
  // Caller
  | { type: 'pttPress' }
  | { type: 'pttRelease' }
  | { type: 'interrupt' }
  | { type: 'restart' }
  | { type: 'clear' }
  | { type: 'setInputMode'; mode: InputMode }
  // Recognizer
  | { type: 'transcriptPartial'; text: string }
  | { type: 'transcriptFinal'; text: string }
  | { type: 'recognitionError'; error: Error }
  // Transport
  | { type: 'textStart' }
  | { type: 'textDelta'; content: string }
  | { type: 'sentenceEnd'; sentence: string }
  | { type: 'textDone'; fullText: string }
  | { type: 'remoteInterrupted' }
  | { type: 'remoteError'; message: string }
  | { type: 'connectionLost'; error: Error }
  /** Reconnected after a drop; a turn in flight on the old socket is gone */
  | { type: 'connectionRestored' }
  | { type: 'sendFailed'; error: Error }
  // Player
  | { type: 'playbackStarted' }
  | { type: 'playbackFinished' }
  | { type: 'synthesisError'; error: Error }
  // Session timers and lifecycle
  | { type: 'resumeListening' }
  | { type: 'restartFailed'; error: Error };

export type DialogueEventType = DialogueEvent['type'];

// ============ Effects ============

export interface MessageDraft {
  role: MessageRole;
  content: string;
  interrupted?: boolean;
}

export type DialogueEffect =
  | { type: 'startRecognition' }
  | { type: 'finishRecognition' }
  | { type: 'cancelRecognition' }
  | { type: 'sendText'; text: string }
  | { type: 'sendInterrupt' }
  | { type: 'enqueueSentence'; text: string }
  | { type: 'stopPlayback' }
  /** Close the microphone; reinitialize reopens it */
  | { type: 'releaseMicrophone' }
  /** Raise the detector's barge-in threshold while speech is audible */
  | { type: 'setPlaybackGuard'; active: boolean }
  /** Fire resumeListening after the resume delay */
  | { type: 'scheduleResume' }
  | { type: 'armDetector' }
  | { type: 'appendMessage'; message: MessageDraft }
  | { type: 'clearSession' }
  | { type: 'reinitialize' }
  | { type: 'reportProtocolViolation'; error: ProtocolOrderingError };

// ============ Context ============

/** Progress of the assistant turn currently being received */
export interface TurnState {
  /** text_start seen for this turn */
  started: boolean;
  response: string;
  sentences: number;
  /** text_done seen for this turn */
  done: boolean;
}

/** Who opened the current recognition, and so who may end it */
export type CaptureOwner = 'detector' | 'pushToTalk';

export interface DialogueContext {
  state: ConversationState;
  inputMode: InputMode;
  /** Set while listening or interrupted */
  captureOwner: CaptureOwner | null;
  /** Hands-free speechStart in idle only counts while armed */
  detectorArmed: boolean;
  /** Enqueued speech that has not finished playing */
  playbackPending: boolean;
  utterance: Utterance;
  turn: TurnState;
  minInterruptedResponseLength: number;
}

export interface TransitionResult {
  context: DialogueContext;
  effects: DialogueEffect[];
}

export const emptyUtterance: Utterance = { partialText: '', finalText: '', isFinal: false };

export const emptyTurn: TurnState = { started: false, response: '', sentences: 0, done: false };

export function createDialogueContext(options: {
  inputMode: InputMode;
  minInterruptedResponseLength: number;
}): DialogueContext {
  return {
    state: { status: 'idle' },
    inputMode: options.inputMode,
    captureOwner: null,
    detectorArmed: true,
    playbackPending: false,
    utterance: emptyUtterance,
    turn: emptyTurn,
    minInterruptedResponseLength: options.minInterruptedResponseLength,
  };
}
