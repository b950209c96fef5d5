import { offlineStatus, type ChannelStatus } from '../../../entities/channel-status';
import { detectChanges, isSameState } from './change-detector';

function live(login: string, category: string): ChannelStatus {
  return { login, isLive: true, category };
}

function statuses(...items: ChannelStatus[]): Map<string, ChannelStatus> {
  return new Map(items.map((s) => [s.login, s]));
}

describe('detectChanges', () => {
  it('records first observations without events', () => {
    const result = detectChanges(statuses(live('alpha', 'Just Chatting'), offlineStatus('beta')), {});

    expect(result.events).toEqual([]);
    expect(result.firstSeen).toEqual(['alpha', 'beta']);
    expect(result.nextState).toEqual({ alpha: 'Just Chatting', beta: 'offline' });
  });

  it('emits one event for a changed category and records new channels silently', () => {
    const result = detectChanges(statuses(live('a', 'Valorant'), offlineStatus('b')), { a: 'Just Chatting' });

    expect(result.events).toEqual([{ login: 'a', oldCategory: 'Just Chatting', newCategory: 'Valorant' }]);
    expect(result.firstSeen).toEqual(['b']);
    expect(result.nextState).toEqual({ a: 'Valorant', b: 'offline' });
  });

  it('emits events for going live and going offline', () => {
    const result = detectChanges(statuses(live('alpha', 'Chess'), offlineStatus('beta')), {
      alpha: 'offline',
      beta: 'Minecraft',
    });

    expect(result.events).toEqual([
      { login: 'alpha', oldCategory: 'offline', newCategory: 'Chess' },
      { login: 'beta', oldCategory: 'Minecraft', newCategory: 'offline' },
    ]);
  });

  it('orders events like the input', () => {
    const result = detectChanges(statuses(live('zeta', 'Chess'), live('alpha', 'Chess'), live('mid', 'Chess')), {
      alpha: 'offline',
      mid: 'offline',
      zeta: 'offline',
    });

    expect(result.events.map((e) => e.login)).toEqual(['zeta', 'alpha', 'mid']);
  });

  it('produces no events for a repeated observation', () => {
    const current = statuses(live('alpha', 'Valorant'), offlineStatus('beta'));

    const first = detectChanges(current, { alpha: 'Just Chatting', beta: 'offline' });
    const second = detectChanges(current, first.nextState);

    expect(first.events).toHaveLength(1);
    expect(second.events).toEqual([]);
    expect(second.nextState).toEqual(first.nextState);
  });

  it('keeps channels that were not fetched and leaves the input untouched', () => {
    const previous = { alpha: 'Chess', removed: 'Just Chatting' };

    const result = detectChanges(statuses(live('alpha', 'Poker')), previous);

    expect(result.nextState).toEqual({ alpha: 'Poker', removed: 'Just Chatting' });
    expect(previous).toEqual({ alpha: 'Chess', removed: 'Just Chatting' });
  });

  it('treats a login named like an object property as unseen', () => {
    const result = detectChanges(statuses(offlineStatus('constructor')), {});

    expect(result.events).toEqual([]);
    expect(result.firstSeen).toEqual(['constructor']);
  });
});

describe('isSameState', () => {
  it('compares entries regardless of key order', () => {
    expect(isSameState({ a: 'x', b: 'y' }, { b: 'y', a: 'x' })).toBe(true);
    expect(isSameState({ a: 'x' }, { a: 'y' })).toBe(false);
    expect(isSameState({ a: 'x' }, { a: 'x', b: 'y' })).toBe(false);
    expect(isSameState({}, {})).toBe(true);
  });
});
