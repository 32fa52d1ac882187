/**
 * Dialogue transition function
 *
 * transition(context, event) is pure: the same context and event always
 * give the same next context and effect list. Combinations that are not
 * listed leave the context untouched and produce no effects; that includes
 * the server's `interrupted`, which only acknowledges our own interrupt.
 */

import { ProtocolOrderingError } from '../errors';
import {
  emptyTurn,
  emptyUtterance,
  type CaptureOwner,
  type DialogueContext,
  type DialogueEffect,
  type DialogueEvent,
  type TransitionResult,
} from './events';

const HALT_AUDIO: DialogueEffect[] = [
  { type: 'stopPlayback' },
  { type: 'setPlaybackGuard', active: false },
  { type: 'cancelRecognition' },
  { type: 'releaseMicrophone' },
];

function unchanged(context: DialogueContext): TransitionResult {
  return { context, effects: [] };
}

function violation(context: DialogueContext, event: string): TransitionResult {
  return {
    context,
    effects: [{ type: 'reportProtocolViolation', error: new ProtocolOrderingError(event, 'awaiting text_start') }],
  };
}

function enterError(context: DialogueContext, reason: string, extra: DialogueEffect[] = []): TransitionResult {
  return {
    context: {
      ...context,
      state: { status: 'error', reason },
      captureOwner: null,
      detectorArmed: false,
      playbackPending: false,
      turn: emptyTurn,
    },
    effects: [...HALT_AUDIO, ...extra],
  };
}

/** Back to idle with the detector disarmed until the resume delay passes */
function returnToIdle(context: DialogueContext, effects: DialogueEffect[]): TransitionResult {
  return {
    context: {
      ...context,
      state: { status: 'idle' },
      captureOwner: null,
      detectorArmed: false,
      playbackPending: false,
    },
    effects: [...effects, { type: 'scheduleResume' }],
  };
}

function beginListening(context: DialogueContext, owner: CaptureOwner): TransitionResult {
  return {
    context: { ...context, state: { status: 'listening' }, captureOwner: owner, utterance: emptyUtterance },
    effects: [{ type: 'startRecognition' }],
  };
}

/** Partial answer kept in history when the user cuts the assistant off */
function partialResponse(context: DialogueContext): DialogueEffect[] {
  const partial = context.turn.response.trim();
  if (context.turn.done || partial.length <= context.minInterruptedResponseLength) {
    return [];
  }
  return [
    {
      type: 'appendMessage',
      message: { role: 'assistant', content: `${partial}... [interrupted]`, interrupted: true },
    },
  ];
}

function cancelTurn(context: DialogueContext): TransitionResult {
  const effects: DialogueEffect[] = [
    { type: 'stopPlayback' },
    { type: 'setPlaybackGuard', active: false },
    { type: 'sendInterrupt' },
    ...partialResponse(context),
  ];
  return returnToIdle({ ...context, turn: emptyTurn }, effects);
}

/** The server dropped the turn with the connection; nothing to interrupt */
function abandonTurn(context: DialogueContext): TransitionResult {
  return returnToIdle({ ...context, turn: emptyTurn }, partialResponse(context));
}

// ============ Per-state handlers ============

function fromIdle(context: DialogueContext, event: DialogueEvent): TransitionResult {
  switch (event.type) {
    case 'speechStart':
      if (context.inputMode === 'handsFree' && context.detectorArmed) {
        return beginListening(context, 'detector');
      }
      return unchanged(context);

    case 'pttPress':
      return beginListening(context, 'pushToTalk');

    case 'resumeListening':
      return { context: { ...context, detectorArmed: true }, effects: [{ type: 'armDetector' }] };

    default:
      return unchanged(context);
  }
}

/**
 * Shared by listening and interrupted: the recognizer owns the microphone.
 * A capture the detector opened (every barge-in included) ends on the
 * detector's events whatever the input mode is now; a push-to-talk capture
 * ends on release.
 */
function fromCapturing(context: DialogueContext, event: DialogueEvent): TransitionResult {
  switch (event.type) {
    case 'transcriptPartial':
      return {
        context: { ...context, utterance: { partialText: event.text, finalText: '', isFinal: false } },
        effects: [],
      };

    case 'transcriptFinal': {
      const text = event.text.trim();
      if (!text) {
        return returnToIdle({ ...context, utterance: emptyUtterance }, []);
      }
      return {
        context: {
          ...context,
          state: { status: 'processing' },
          captureOwner: null,
          utterance: { partialText: text, finalText: text, isFinal: true },
          turn: emptyTurn,
          playbackPending: false,
        },
        effects: [
          { type: 'appendMessage', message: { role: 'user', content: text } },
          { type: 'sendText', text },
        ],
      };
    }

    case 'speechEnd':
      if (context.captureOwner === 'detector') {
        return { context, effects: [{ type: 'finishRecognition' }] };
      }
      return unchanged(context);

    case 'pttRelease':
      return { context, effects: [{ type: 'finishRecognition' }] };

    case 'speechCancelled':
      if (context.captureOwner === 'detector') {
        return returnToIdle({ ...context, utterance: emptyUtterance }, [{ type: 'cancelRecognition' }]);
      }
      return unchanged(context);

    case 'recognitionError':
      return enterError(context, event.error.message);

    default:
      return unchanged(context);
  }
}

function fromProcessing(context: DialogueContext, event: DialogueEvent): TransitionResult {
  const { turn } = context;

  switch (event.type) {
    case 'textStart':
      return { context: { ...context, turn: { ...emptyTurn, started: true } }, effects: [] };

    case 'textDelta':
      if (!turn.started) return violation(context, 'text_delta');
      return { context: { ...context, turn: { ...turn, response: turn.response + event.content } }, effects: [] };

    case 'sentenceEnd':
      if (!turn.started) return violation(context, 'sentence_end');
      return {
        context: {
          ...context,
          state: { status: 'speaking' },
          turn: { ...turn, sentences: turn.sentences + 1 },
          playbackPending: true,
        },
        effects: [
          { type: 'setPlaybackGuard', active: true },
          { type: 'enqueueSentence', text: event.sentence },
        ],
      };

    case 'textDone': {
      if (!turn.started) return violation(context, 'text_done');
      const full = (event.fullText || turn.response).trim();
      const doneTurn = { ...turn, done: true };
      if (!full) {
        return returnToIdle({ ...context, turn: doneTurn }, []);
      }
      // No sentence boundaries arrived: speak the whole response at once
      return {
        context: { ...context, state: { status: 'speaking' }, turn: doneTurn, playbackPending: true },
        effects: [
          { type: 'appendMessage', message: { role: 'assistant', content: full } },
          { type: 'setPlaybackGuard', active: true },
          { type: 'enqueueSentence', text: full },
        ],
      };
    }

    case 'remoteError':
      return enterError(context, event.message);

    case 'sendFailed':
      return enterError(context, event.error.message);

    case 'synthesisError':
      return enterError(context, event.error.message, [{ type: 'sendInterrupt' }]);

    case 'interrupt':
      return cancelTurn(context);

    case 'connectionRestored':
      return abandonTurn(context);

    default:
      return unchanged(context);
  }
}

function fromSpeaking(context: DialogueContext, event: DialogueEvent): TransitionResult {
  const { turn } = context;
  const finishSpeaking = (next: DialogueContext) =>
    returnToIdle(next, [{ type: 'setPlaybackGuard', active: false }]);

  switch (event.type) {
    case 'textDelta':
      return { context: { ...context, turn: { ...turn, response: turn.response + event.content } }, effects: [] };

    case 'sentenceEnd':
      return {
        context: { ...context, turn: { ...turn, sentences: turn.sentences + 1 }, playbackPending: true },
        effects: [{ type: 'enqueueSentence', text: event.sentence }],
      };

    case 'textDone': {
      const full = (event.fullText || turn.response).trim();
      const next = { ...context, turn: { ...turn, done: true } };
      const append: DialogueEffect[] = full
        ? [{ type: 'appendMessage', message: { role: 'assistant', content: full } }]
        : [];
      if (!context.playbackPending) {
        const result = finishSpeaking(next);
        return { context: result.context, effects: [...append, ...result.effects] };
      }
      return { context: next, effects: append };
    }

    case 'playbackStarted':
      return { context: { ...context, playbackPending: true }, effects: [] };

    case 'playbackFinished': {
      const next = { ...context, playbackPending: false };
      // More sentences may still be on their way
      return turn.done ? finishSpeaking(next) : { context: next, effects: [] };
    }

    case 'speechStart':
      // Barge-in: silence the assistant before listening again
      return {
        context: {
          ...context,
          state: { status: 'interrupted' },
          captureOwner: 'detector',
          playbackPending: false,
          turn: emptyTurn,
          utterance: emptyUtterance,
        },
        effects: [
          { type: 'stopPlayback' },
          { type: 'setPlaybackGuard', active: false },
          { type: 'sendInterrupt' },
          ...partialResponse(context),
          { type: 'startRecognition' },
        ],
      };

    case 'interrupt':
      return cancelTurn(context);

    case 'connectionRestored': {
      // The rest of the answer is lost; finish what is already queued
      if (turn.done) return unchanged(context);
      const next = { ...context, turn: { ...turn, done: true } };
      const partial = partialResponse(context);
      if (!context.playbackPending) {
        const result = finishSpeaking(next);
        return { context: result.context, effects: [...partial, ...result.effects] };
      }
      return { context: next, effects: partial };
    }

    case 'remoteError':
      return enterError(context, event.message);

    case 'synthesisError':
      return enterError(context, event.error.message, [{ type: 'sendInterrupt' }]);

    default:
      return unchanged(context);
  }
}

function fromError(context: DialogueContext, event: DialogueEvent): TransitionResult {
  if (event.type !== 'restart') return unchanged(context);
  return {
    context: {
      ...context,
      state: { status: 'idle' },
      detectorArmed: false,
      playbackPending: false,
      turn: emptyTurn,
      utterance: emptyUtterance,
    },
    effects: [{ type: 'reinitialize' }, { type: 'scheduleResume' }],
  };
}

// ============ Entry point ============

export function transition(context: DialogueContext, event: DialogueEvent): TransitionResult {
  // Events handled the same way in every state
  switch (event.type) {
    case 'clear':
      return { context, effects: [{ type: 'clearSession' }] };

    case 'setInputMode': {
      const next = { ...context, inputMode: event.mode };
      if (event.mode === 'handsFree' && context.state.status === 'idle' && !context.detectorArmed) {
        return { context: { ...next, detectorArmed: true }, effects: [{ type: 'armDetector' }] };
      }
      return { context: next, effects: [] };
    }

    case 'connectionLost':
    case 'captureFailed':
    case 'restartFailed':
      if (context.state.status === 'error') return unchanged(context);
      return enterError(context, event.error.message);
  }

  switch (context.state.status) {
    case 'idle':
      return fromIdle(context, event);
    case 'listening':
    case 'interrupted':
      return fromCapturing(context, event);
    case 'processing':
      return fromProcessing(context, event);
    case 'speaking':
      return fromSpeaking(context, event);
    case 'error':
      return fromError(context, event);
  }
}

/** Replay a sequence of events from a starting context */
export function replay(context: DialogueContext, events: DialogueEvent[]): TransitionResult {
  let current = context;
  const effects: DialogueEffect[] = [];
  for (const event of events) {
    const result = transition(current, event);
    current = result.context;
    effects.push(...result.effects);
  }
  return { context: current, effects };
}
