import { Request, Response } from 'express';
import { BusEvent, IEventBus } from '@/events/EventBus';

const KEEP_ALIVE_MS = 25_000;

function writeEvent(res: Response, event: BusEvent): void {
  res.write(`event: ${event.event}\n`);
  res.write(`data: ${JSON.stringify(event.payload)}\n\n`);
}

/**
 * Relay a bus topic to the client as Server-Sent Events until it disconnects.
 * The topic's latest event, if any, is sent first.
 */
export function streamTopic(req: Request, res: Response, eventBus: IEventBus, topic: string): void {
  res.status(200);
  res.setHeader('Content-Type', 'text/event-stream');
  res.setHeader('Cache-Control', 'no-cache');
  res.setHeader('Connection', 'keep-alive');
  res.setHeader('X-Accel-Buffering', 'no');
  res.flushHeaders();

  const latest = eventBus.latest(topic);
  if (latest) {
    writeEvent(res, latest);
  }

  const unsubscribe = eventBus.subscribe(topic, (event) => writeEvent(res, event));
  const keepAlive = setInterval(() => res.write(': keep-alive\n\n'), KEEP_ALIVE_MS);
  keepAlive.unref();

  req.on('close', () => {
    clearInterval(keepAlive);
    unsubscribe();
    res.end();
  });
}
