import { describe, it, expect } from 'vitest';
import { ProtocolOrderingError } from '../src/errors';
import { createDialogueContext, type DialogueContext, type DialogueEvent } from '../src/dialogue/events';
import { replay, transition } from '../src/dialogue/transitions';

const handsFree = () => createDialogueContext({ inputMode: 'handsFree', minInterruptedResponseLength: 10 });
const pushToTalk = () => createDialogueContext({ inputMode: 'pushToTalk', minInterruptedResponseLength: 10 });

const effectTypes = (events: DialogueEvent[], from: DialogueContext = handsFree()) =>
  replay(from, events).effects.map((effect) => effect.type);

const stateAfter = (events: DialogueEvent[], from: DialogueContext = handsFree()) =>
  replay(from, events).context.state.status;

const toProcessing: DialogueEvent[] = [
  { type: 'speechStart' },
  { type: 'speechEnd' },
  { type: 'transcriptFinal', text: 'What time is it?' },
];

const toSpeaking: DialogueEvent[] = [
  ...toProcessing,
  { type: 'textStart' },
  { type: 'textDelta', content: "It's a great d" },
  { type: 'sentenceEnd', sentence: "It's a great d" },
];

describe('transition', () => {
  it('is deterministic', () => {
    const events: DialogueEvent[] = [...toSpeaking, { type: 'playbackStarted' }, { type: 'speechStart' }];
    const first = replay(handsFree(), events);
    const second = replay(handsFree(), events);
    expect(second).toEqual(first);
  });

  it('does not mutate the context it is given', () => {
    const context = handsFree();
    const snapshot = JSON.stringify(context);
    transition(context, { type: 'speechStart' });
    expect(JSON.stringify(context)).toBe(snapshot);
  });

  // ============ Idle ============

  it('starts listening on speech in hands-free mode', () => {
    const result = transition(handsFree(), { type: 'speechStart' });
    expect(result.context.state.status).toBe('listening');
    expect(result.effects).toEqual([{ type: 'startRecognition' }]);
  });

  it('ignores detected speech in push-to-talk mode', () => {
    expect(stateAfter([{ type: 'speechStart' }], pushToTalk())).toBe('idle');
    expect(stateAfter([{ type: 'pttPress' }], pushToTalk())).toBe('listening');
  });

  it('ignores speech until the detector is re-armed after a turn', () => {
    const idleAgain = replay(handsFree(), [{ type: 'speechStart' }, { type: 'transcriptFinal', text: '' }]).context;
    expect(idleAgain.detectorArmed).toBe(false);
    expect(transition(idleAgain, { type: 'speechStart' }).context.state.status).toBe('idle');

    const armed = transition(idleAgain, { type: 'resumeListening' });
    expect(armed.effects).toEqual([{ type: 'armDetector' }]);
    expect(transition(armed.context, { type: 'speechStart' }).context.state.status).toBe('listening');
  });

  // ============ Listening ============

  it('submits a final transcript', () => {
    const result = replay(handsFree(), toProcessing);
    expect(result.context.state.status).toBe('processing');
    expect(result.context.utterance).toEqual({
      partialText: 'What time is it?',
      finalText: 'What time is it?',
      isFinal: true,
    });
    expect(result.effects).toEqual([
      { type: 'startRecognition' },
      { type: 'finishRecognition' },
      { type: 'appendMessage', message: { role: 'user', content: 'What time is it?' } },
      { type: 'sendText', text: 'What time is it?' },
    ]);
  });

  it('returns to idle on an empty transcript without sending anything', () => {
    const result = replay(handsFree(), [{ type: 'speechStart' }, { type: 'transcriptFinal', text: '   ' }]);
    expect(result.context.state.status).toBe('idle');
    expect(result.effects.map((e) => e.type)).toEqual(['startRecognition', 'scheduleResume']);
  });

  it('tracks partial transcripts', () => {
    const result = replay(handsFree(), [{ type: 'speechStart' }, { type: 'transcriptPartial', text: 'what ti' }]);
    expect(result.context.utterance).toEqual({ partialText: 'what ti', finalText: '', isFinal: false });
  });

  it('abandons recognition when the detector withdraws the speech', () => {
    expect(effectTypes([{ type: 'speechStart' }, { type: 'speechCancelled' }])).toEqual([
      'startRecognition',
      'cancelRecognition',
      'scheduleResume',
    ]);
  });

  it('ends a push-to-talk turn on release only', () => {
    const events: DialogueEvent[] = [{ type: 'pttPress' }, { type: 'speechEnd' }, { type: 'pttRelease' }];
    expect(effectTypes(events, pushToTalk())).toEqual(['startRecognition', 'finishRecognition']);
  });

  it('lets the detector end a capture it opened after a switch to push-to-talk', () => {
    const events: DialogueEvent[] = [
      { type: 'speechStart' },
      { type: 'setInputMode', mode: 'pushToTalk' },
      { type: 'speechEnd' },
    ];
    expect(effectTypes(events)).toEqual(['startRecognition', 'finishRecognition']);
  });

  it('ends a barge-in on the detector in push-to-talk mode', () => {
    const speaking: DialogueEvent[] = [
      { type: 'pttPress' },
      { type: 'transcriptFinal', text: 'Tell me a story' },
      { type: 'textStart' },
      { type: 'sentenceEnd', sentence: 'Once upon a time.' },
    ];
    const bargeIn = replay(pushToTalk(), [...speaking, { type: 'speechStart' }]).context;
    expect(bargeIn.state.status).toBe('interrupted');
    expect(bargeIn.captureOwner).toBe('detector');

    expect(transition(bargeIn, { type: 'speechEnd' }).effects).toEqual([{ type: 'finishRecognition' }]);

    const cough = transition(bargeIn, { type: 'speechCancelled' });
    expect(cough.context.state.status).toBe('idle');
    expect(cough.effects).toEqual([{ type: 'cancelRecognition' }, { type: 'scheduleResume' }]);
  });

  it('halts audio when recognition fails', () => {
    const result = replay(handsFree(), [
      { type: 'speechStart' },
      { type: 'recognitionError', error: new Error('Microphone access denied') },
    ]);
    expect(result.context.state).toEqual({ status: 'error', reason: 'Microphone access denied' });
    expect(result.effects.map((e) => e.type)).toEqual([
      'startRecognition',
      'stopPlayback',
      'setPlaybackGuard',
      'cancelRecognition',
      'releaseMicrophone',
    ]);
  });

  // ============ Processing ============

  it('ignores and reports a sentence before text_start', () => {
    const result = replay(handsFree(), [...toProcessing, { type: 'sentenceEnd', sentence: 'Too early.' }]);
    expect(result.context.state.status).toBe('processing');
    expect(result.effects.some((e) => e.type === 'enqueueSentence')).toBe(false);

    const last = result.effects[result.effects.length - 1];
    expect(last.type).toBe('reportProtocolViolation');
    if (last.type === 'reportProtocolViolation') {
      expect(last.error).toBeInstanceOf(ProtocolOrderingError);
      expect(last.error.message).toBe('Received sentence_end while awaiting text_start');
    }
  });

  it('speaks each sentence as it arrives', () => {
    const result = replay(handsFree(), toSpeaking);
    expect(result.context.state.status).toBe('speaking');
    expect(result.context.turn.response).toBe("It's a great d");
    expect(result.effects.slice(-2)).toEqual([
      { type: 'setPlaybackGuard', active: true },
      { type: 'enqueueSentence', text: "It's a great d" },
    ]);
  });

  it('speaks the whole answer when no sentence boundary came', () => {
    const result = replay(handsFree(), [
      ...toProcessing,
      { type: 'textStart' },
      { type: 'textDelta', content: 'Sure' },
      { type: 'textDone', fullText: 'Sure' },
    ]);
    expect(result.context.state.status).toBe('speaking');
    expect(result.effects.slice(-3)).toEqual([
      { type: 'appendMessage', message: { role: 'assistant', content: 'Sure' } },
      { type: 'setPlaybackGuard', active: true },
      { type: 'enqueueSentence', text: 'Sure' },
    ]);
  });

  it('goes back to idle on an empty answer', () => {
    expect(
      stateAfter([...toProcessing, { type: 'textStart' }, { type: 'textDone', fullText: '' }])
    ).toBe('idle');
  });

  it('enters error on a server error', () => {
    const result = replay(handsFree(), [...toProcessing, { type: 'remoteError', message: 'model overloaded' }]);
    expect(result.context.state).toEqual({ status: 'error', reason: 'model overloaded' });
  });

  it('treats the server acknowledgement of an interrupt as a no-op', () => {
    const processing = replay(handsFree(), toProcessing).context;
    const ack = transition(processing, { type: 'remoteInterrupted' });
    expect(ack.context).toEqual(processing);
    expect(ack.effects).toEqual([]);
  });

  it('abandons a turn the server lost with the connection', () => {
    const result = replay(handsFree(), [
      ...toProcessing,
      { type: 'textStart' },
      { type: 'textDelta', content: 'Let me check the' },
      { type: 'connectionRestored' },
    ]);
    expect(result.context.state.status).toBe('idle');
    expect(result.effects.slice(-2)).toEqual([
      {
        type: 'appendMessage',
        message: { role: 'assistant', content: 'Let me check the... [interrupted]', interrupted: true },
      },
      { type: 'scheduleResume' },
    ]);
    expect(result.effects).not.toContainEqual({ type: 'sendInterrupt' });
  });

  it('enters error when the text cannot be sent', () => {
    expect(stateAfter([...toProcessing, { type: 'sendFailed', error: new Error('not connected') }])).toBe('error');
  });

  // ============ Speaking ============

  it('stays speaking until playback of a finished answer ends', () => {
    const done = replay(handsFree(), [
      ...toSpeaking,
      { type: 'playbackStarted' },
      { type: 'textDone', fullText: "It's a great day." },
    ]);
    expect(done.context.state.status).toBe('speaking');
    expect(done.effects[done.effects.length - 1]).toEqual({
      type: 'appendMessage',
      message: { role: 'assistant', content: "It's a great day." },
    });

    const finished = transition(done.context, { type: 'playbackFinished' });
    expect(finished.context.state.status).toBe('idle');
    expect(finished.effects).toEqual([{ type: 'setPlaybackGuard', active: false }, { type: 'scheduleResume' }]);
  });

  it('keeps speaking between sentences while the answer streams', () => {
    const result = replay(handsFree(), [...toSpeaking, { type: 'playbackStarted' }, { type: 'playbackFinished' }]);
    expect(result.context.state.status).toBe('speaking');
  });

  it('goes idle at text_done when playback already drained', () => {
    const result = replay(handsFree(), [
      ...toSpeaking,
      { type: 'playbackStarted' },
      { type: 'playbackFinished' },
      { type: 'textDone', fullText: "It's a great d" },
    ]);
    expect(result.context.state.status).toBe('idle');
  });

  it('stops playback before listening again on barge-in', () => {
    const result = replay(handsFree(), [...toSpeaking, { type: 'playbackStarted' }]);
    const bargeIn = transition(result.context, { type: 'speechStart' });

    expect(bargeIn.context.state.status).toBe('interrupted');
    expect(bargeIn.effects).toEqual([
      { type: 'stopPlayback' },
      { type: 'setPlaybackGuard', active: false },
      { type: 'sendInterrupt' },
      {
        type: 'appendMessage',
        message: { role: 'assistant', content: "It's a great d... [interrupted]", interrupted: true },
      },
      { type: 'startRecognition' },
    ]);
  });

  it('drops a short partial answer on barge-in', () => {
    const result = replay(handsFree(), [
      ...toProcessing,
      { type: 'textStart' },
      { type: 'textDelta', content: 'Sure' },
      { type: 'sentenceEnd', sentence: 'Sure' },
      { type: 'speechStart' },
    ]);
    expect(result.effects.some((e) => e.type === 'appendMessage' && e.message.role === 'assistant')).toBe(false);
  });

  it('submits the next utterance after an interruption', () => {
    const result = replay(handsFree(), [
      ...toSpeaking,
      { type: 'speechStart' },
      { type: 'speechEnd' },
      { type: 'transcriptFinal', text: 'Never mind' },
    ]);
    expect(result.context.state.status).toBe('processing');
  });

  it('ignores late stream events once interrupted', () => {
    const interrupted = replay(handsFree(), [...toSpeaking, { type: 'speechStart' }]).context;
    const late = replay(interrupted, [
      { type: 'textDelta', content: 'ay.' },
      { type: 'sentenceEnd', sentence: 'More.' },
      { type: 'remoteInterrupted' },
    ]);
    expect(late.context).toEqual(interrupted);
    expect(late.effects).toEqual([]);
  });

  it('cancels the turn on an explicit interrupt', () => {
    const result = replay(handsFree(), [...toSpeaking, { type: 'interrupt' }]);
    expect(result.context.state.status).toBe('idle');
    expect(result.effects.slice(-5).map((e) => e.type)).toEqual([
      'stopPlayback',
      'setPlaybackGuard',
      'sendInterrupt',
      'appendMessage',
      'scheduleResume',
    ]);
  });

  it('finishes the queued speech when the connection comes back mid-answer', () => {
    const playing = replay(handsFree(), [...toSpeaking, { type: 'playbackStarted' }, { type: 'connectionRestored' }]);
    expect(playing.context.state.status).toBe('speaking');
    expect(playing.effects[playing.effects.length - 1]).toEqual({
      type: 'appendMessage',
      message: { role: 'assistant', content: "It's a great d... [interrupted]", interrupted: true },
    });
    expect(transition(playing.context, { type: 'playbackFinished' }).context.state.status).toBe('idle');

    const drained = replay(handsFree(), [
      ...toSpeaking,
      { type: 'playbackStarted' },
      { type: 'playbackFinished' },
      { type: 'connectionRestored' },
    ]);
    expect(drained.context.state.status).toBe('idle');
  });

  it('stops the server when synthesis fails', () => {
    const result = replay(handsFree(), [...toSpeaking, { type: 'synthesisError', error: new Error('no voice') }]);
    expect(result.context.state.status).toBe('error');
    expect(result.effects[result.effects.length - 1]).toEqual({ type: 'sendInterrupt' });
  });

  // ============ Error ============

  it('enters error from any state when the connection is lost', () => {
    const lost: DialogueEvent = { type: 'connectionLost', error: new Error('retries exhausted') };
    expect(stateAfter([lost])).toBe('error');
    expect(stateAfter([{ type: 'speechStart' }, lost])).toBe('error');
    expect(stateAfter([...toProcessing, lost])).toBe('error');
    expect(stateAfter([...toSpeaking, lost])).toBe('error');
  });

  it('only leaves error through restart', () => {
    const failed = replay(handsFree(), [{ type: 'captureFailed', error: new Error('device unplugged') }]).context;
    expect(transition(failed, { type: 'speechStart' }).context).toEqual(failed);
    expect(transition(failed, { type: 'pttPress' }).context).toEqual(failed);

    const restarted = transition(failed, { type: 'restart' });
    expect(restarted.context.state.status).toBe('idle');
    expect(restarted.effects).toEqual([{ type: 'reinitialize' }, { type: 'scheduleResume' }]);
  });

  it('returns to error when a restart fails', () => {
    const failed = replay(handsFree(), [{ type: 'captureFailed', error: new Error('device unplugged') }]).context;
    const restarted = transition(failed, { type: 'restart' }).context;
    const result = transition(restarted, { type: 'restartFailed', error: new Error('device busy') });

    expect(result.context.state).toEqual({ status: 'error', reason: 'device busy' });
    expect(result.effects.map((effect) => effect.type)).toContain('releaseMicrophone');
  });

  // ============ Any state ============

  it('clears history in any state', () => {
    expect(transition(handsFree(), { type: 'clear' }).effects).toEqual([{ type: 'clearSession' }]);
    const speaking = replay(handsFree(), toSpeaking).context;
    const cleared = transition(speaking, { type: 'clear' });
    expect(cleared.context).toEqual(speaking);
    expect(cleared.effects).toEqual([{ type: 'clearSession' }]);
  });

  it('arms the detector when switching to hands-free while idle', () => {
    const idle = replay(pushToTalk(), [{ type: 'pttPress' }, { type: 'transcriptFinal', text: '' }]).context;
    const switched = transition(idle, { type: 'setInputMode', mode: 'handsFree' });
    expect(switched.context.inputMode).toBe('handsFree');
    expect(switched.context.detectorArmed).toBe(true);
    expect(switched.effects).toEqual([{ type: 'armDetector' }]);
  });
});
