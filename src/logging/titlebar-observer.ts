/**
 * Terminal title observer
 * Names the state each agent is entering in the terminal's title bar
 */

import { extname, basename } from 'path';
import { EventBus } from '../events/event-bus';
import { StateStartedEvent } from '../events/events';

/**
 * OSC 2 sequence that sets the window title to "waypoint: <state stem>"
 */
export function titleSequence(stateName: string): string {
  return `\x1b]2;waypoint: ${basename(stateName, extname(stateName))}\x07`;
}

export class TitleBarObserver {
  private readonly handler = (event: StateStartedEvent): void => {
    this.write(titleSequence(event.stateName));
  };

  constructor(
    private readonly bus: EventBus,
    private readonly write: (text: string) => void
  ) {
    bus.on('state_started', this.handler);
  }

  close(): void {
    this.bus.off('state_started', this.handler);
  }
}
