/**
 * Progress Channel Tests
 */

import { ProgressEvent } from '../../orchestration/orchestrator.types';
import { ProgressChannel } from '../progress-channel';

function pageEvent(pageUrl: string): ProgressEvent {
  return {
    type: 'page_completed',
    siteUrl: 'https://tonys.test',
    pageUrl,
    pageType: null,
    status: 'success',
    pagesCompleted: 1,
    pagesTotal: 1,
    sitesCompleted: 0,
    sitesTotal: 1,
    timestamp: 0,
  };
}

describe('ProgressChannel', () => {
  it('returns buffered events oldest first and empties the buffer', () => {
    const channel = new ProgressChannel(5);
    channel.publish(pageEvent('/a'));
    channel.publish(pageEvent('/b'));

    expect(channel.drain().map((event) => event.pageUrl)).toEqual(['/a', '/b']);
    expect(channel.size()).toBe(0);
    expect(channel.drain()).toEqual([]);
  });

  it('drops the oldest events once full', () => {
    const channel = new ProgressChannel(2);
    channel.publish(pageEvent('/a'));
    channel.publish(pageEvent('/b'));
    channel.publish(pageEvent('/c'));
    channel.publish(pageEvent('/d'));

    expect(channel.size()).toBe(2);
    expect(channel.droppedCount()).toBe(2);
    expect(channel.drain().map((event) => event.pageUrl)).toEqual(['/c', '/d']);
  });

  it('keeps order after wrapping around', () => {
    const channel = new ProgressChannel(3);
    channel.publish(pageEvent('/a'));
    channel.publish(pageEvent('/b'));
    channel.drain();
    channel.publish(pageEvent('/c'));
    channel.publish(pageEvent('/d'));
    channel.publish(pageEvent('/e'));
    channel.publish(pageEvent('/f'));

    expect(channel.drain().map((event) => event.pageUrl)).toEqual(['/d', '/e', '/f']);
  });

  it('notifies subscribers until they unsubscribe', () => {
    const channel = new ProgressChannel(5);
    const subscriber = jest.fn();
    const unsubscribe = channel.subscribe(subscriber);

    channel.publish(pageEvent('/a'));
    unsubscribe();
    channel.publish(pageEvent('/b'));

    expect(subscriber).toHaveBeenCalledTimes(1);
    expect(subscriber).toHaveBeenCalledWith(expect.objectContaining({ pageUrl: '/a' }));
  });

  it('keeps publishing when a subscriber throws', () => {
    const channel = new ProgressChannel(5);
    const healthy = jest.fn();
    channel.subscribe(() => {
      throw new Error('display closed');
    });
    channel.subscribe(healthy);

    expect(() => channel.publish(pageEvent('/a'))).not.toThrow();
    expect(healthy).toHaveBeenCalledTimes(1);
    expect(channel.size()).toBe(1);
    expect(console.error).toHaveBeenCalledWith('Progress: subscriber failed on page_completed: display closed');
  });

  it('holds at least one event', () => {
    const channel = new ProgressChannel(0);
    channel.publish(pageEvent('/a'));
    channel.publish(pageEvent('/b'));

    expect(channel.drain().map((event) => event.pageUrl)).toEqual(['/b']);
  });
});
