import { describe, it, expect } from 'vitest';
import { DisplayError } from '../errors';
import { HeadlessBackend } from './headless';
import { fillImage, imageText } from './raster';

describe('HeadlessBackend', () => {
  it('returns scripted batches in order, then empty ones', () => {
    const backend = new HeadlessBackend();
    backend.queue([{ type: 'quit' }], []);
    expect(backend.pendingBatches).toBe(2);
    expect(backend.poll()).toEqual([{ type: 'quit' }]);
    expect(backend.poll()).toEqual([]);
    expect(backend.poll()).toEqual([]);
  });

  it('records one frame per present', () => {
    const backend = new HeadlessBackend();
    const image = fillImage({ width: 1, height: 1 }, [1, 2, 3]);
    backend.fill([9, 9, 9]);
    backend.blit(image, { x: 2, y: 3 });
    backend.present();
    backend.present();

    expect(backend.frames).toHaveLength(2);
    expect(backend.frames[0]).toEqual({ fill: [9, 9, 9], blits: [{ image, at: { x: 2, y: 3 } }] });
    expect(backend.lastFrame).toEqual({ fill: null, blits: [] });
  });

  it('records mode, title and cursor state', () => {
    const backend = new HeadlessBackend();
    backend.setMode({ width: 10, height: 4 }, 3);
    backend.setTitle('Lab');
    backend.setCursorVisible(false);
    backend.close();
    expect(backend.mode).toEqual({ size: { width: 10, height: 4 }, flags: 3 });
    expect(backend.title).toBe('Lab');
    expect(backend.cursorVisible).toBe(false);
    expect(backend.closed).toBe(true);
  });

  it('rejects empty modes', () => {
    expect(() => new HeadlessBackend().setMode({ width: 3, height: 0 }, 0)).toThrow(DisplayError);
  });

  it('reports its display size', () => {
    const backend = new HeadlessBackend({ displaySize: { width: 100, height: 30 } });
    expect(backend.info()).toEqual({ displaySize: { width: 100, height: 30 } });
  });

  it('adds warped cursor motion to the next batch', () => {
    const backend = new HeadlessBackend();
    backend.queue([{ type: 'quit' }]);
    backend.warpCursor({ x: 1, y: 2 });
    expect(backend.poll()).toEqual([
      { type: 'quit' },
      { type: 'mouseMotion', pos: { x: 1, y: 2 }, rel: { x: 0, y: 0 } },
    ]);
  });

  it('rasterizes text', () => {
    const image = new HeadlessBackend().renderText('OK', { bold: false, underline: false }, [0, 0, 0], null);
    expect(imageText(image)).toEqual(['OK']);
  });
});
