import { EventBus } from '@/events/EventBus';

describe('EventBus', () => {
  let bus: EventBus;

  beforeEach(() => {
    bus = new EventBus();
  });

  it('should deliver events to subscribers of the topic only', () => {
    const listener = jest.fn();
    const other = jest.fn();
    bus.subscribe('exporter:admin-1', listener);
    bus.subscribe('exporter:admin-2', other);

    const event = bus.publish('exporter:admin-1', 'user_export:progress', { progress: 50 });

    expect(listener).toHaveBeenCalledWith(event);
    expect(event.payload).toEqual({ progress: 50 });
    expect(other).not.toHaveBeenCalled();
  });

  it('should remember the last event of a topic', () => {
    expect(bus.latest('post_saved:1')).toBeNull();

    bus.publish('post_saved:1', 'post_saved', { ok: true });
    bus.publish('post_saved:1', 'post_saved', { ok: false });

    expect(bus.latest('post_saved:1')?.payload).toEqual({ ok: false });
  });

  it('should stop delivering after unsubscribe', () => {
    const listener = jest.fn();
    const unsubscribe = bus.subscribe('topic', listener);
    expect(bus.listenerCount('topic')).toBe(1);

    unsubscribe();
    bus.publish('topic', 'event', {});

    expect(listener).not.toHaveBeenCalled();
    expect(bus.listenerCount('topic')).toBe(0);
  });

  it('should keep delivering when a listener throws', () => {
    const failing = jest.fn(() => {
      throw new Error('listener broke');
    });
    const healthy = jest.fn();
    bus.subscribe('topic', failing);
    bus.subscribe('topic', healthy);

    bus.publish('topic', 'event', {});

    expect(failing).toHaveBeenCalledTimes(1);
    expect(healthy).toHaveBeenCalledTimes(1);
  });

  it('should forget the retained event of a topic', () => {
    bus.publish('post_saved:1', 'post_saved', { ok: true });

    bus.forget('post_saved:1');

    expect(bus.latest('post_saved:1')).toBeNull();
  });

  it('should drop the least recently published idle topic past the retention limit', () => {
    const small = new EventBus(2);
    small.subscribe('exporter:admin-1', jest.fn());
    small.publish('exporter:admin-1', 'user_export:progress', { progress: 10 });
    small.publish('post_saved:1', 'post_saved', {});
    small.publish('post_saved:2', 'post_saved', {});

    expect(small.latest('post_saved:1')).toBeNull();
    expect(small.latest('exporter:admin-1')?.payload).toEqual({ progress: 10 });
    expect(small.latest('post_saved:2')).not.toBeNull();
  });
});
