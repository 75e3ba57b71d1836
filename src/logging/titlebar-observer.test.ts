import { describe, it, expect } from 'vitest';
import { TitleBarObserver, titleSequence } from './titlebar-observer';
import { EventBus } from '../events/event-bus';
import { BufferLogger } from './buffer-logger';
import { MockClock } from '../types/clock';

describe('titleSequence', () => {
  it('should name the state without its extension', () => {
    expect(titleSequence('REVIEW.md')).toBe('\x1b]2;waypoint: REVIEW\x07');
    expect(titleSequence('build.step.sh')).toBe('\x1b]2;waypoint: build.step\x07');
  });
});

describe('TitleBarObserver', () => {
  it('should retitle on every state start and stop after close', () => {
    const bus = new EventBus(new BufferLogger(), new MockClock());
    const written: string[] = [];
    const observer = new TitleBarObserver(bus, (text) => written.push(text));

    bus.emit({ type: 'state_started', agentId: 'main', stateName: 'START.md', stateType: 'prompt' });
    bus.emit({ type: 'workflow_started', workflowId: 'wf1', scopeDir: '/flows/demo', debugDir: null });
    bus.emit({ type: 'state_started', agentId: 'main', stateName: 'CHECK.sh', stateType: 'script' });
    observer.close();
    bus.emit({ type: 'state_started', agentId: 'main', stateName: 'LATE.md', stateType: 'prompt' });

    expect(written).toEqual(['\x1b]2;waypoint: START\x07', '\x1b]2;waypoint: CHECK\x07']);
  });
});
