import { describe, it, expect } from 'vitest';
import { StagedLayer } from './StagedLayer';

describe('StagedLayer', () => {
  it('should read the fallback for unset coordinates', () => {
    expect(new StagedLayer(7).get(3, 3)).toBe(7);
  });

  it('should hide staged values until commit', () => {
    const layer = new StagedLayer();
    layer.setNext(0, 0, 3);
    expect(layer.get(0, 0)).toBe(0);
    expect(layer.getNext(0, 0)).toBe(3);

    layer.commit();
    expect(layer.get(0, 0)).toBe(3);
  });

  it('should carry unstaged values over a commit', () => {
    const layer = new StagedLayer();
    layer.set(1, 1, 4);
    layer.setNext(0, 0, 2);
    layer.commit();
    expect(layer.get(1, 1)).toBe(4);
    expect(layer.get(0, 0)).toBe(2);
  });

  it('should drop staged values on discard', () => {
    const layer = new StagedLayer();
    layer.set(0, 0, 1);
    layer.setNext(0, 0, 9);
    layer.discard();
    expect(layer.getNext(0, 0)).toBe(1);
  });

  it('should restore committed values from a snapshot', () => {
    const layer = new StagedLayer();
    layer.set(0, 0, 1);
    const restore = layer.snapshot();
    layer.setNext(0, 0, 5);
    layer.commit();

    restore();
    expect(layer.get(0, 0)).toBe(1);
    expect(layer.getNext(0, 0)).toBe(1);
  });
});
