import type { FrameRegion } from '../rfb/types.js';
import { Framebuffer, type FrameSnapshot } from './framebuffer.js';

export type FrameListener = (frame: FrameSnapshot, regions: readonly FrameRegion[]) => void;

/**
 * Applies decoded updates to the session's framebuffer. An update is applied
 * in one synchronous step, in the order its rectangles arrived, so a reader
 * can never observe part of one.
 */
export class FramePipeline {
  private readonly framebuffer: Framebuffer;
  private version = 0;
  private listeners = new Set<FrameListener>();

  constructor(width: number, height: number) {
    this.framebuffer = new Framebuffer(width, height);
  }

  get width(): number {
    return this.framebuffer.width;
  }

  get height(): number {
    return this.framebuffer.height;
  }

  /**
   * Validates every region before touching the image; a bad region rejects
   * the whole update.
   */
  applyUpdate(regions: readonly FrameRegion[]): void {
    for (const region of regions) {
      this.framebuffer.validate(region);
    }
    for (const region of regions) {
      this.framebuffer.apply(region);
    }
    this.version += 1;

    if (this.listeners.size > 0) {
      const frame = this.currentFrame();
      for (const listener of this.listeners) {
        listener(frame, regions);
      }
    }
  }

  currentFrame(): FrameSnapshot {
    return {
      width: this.width,
      height: this.height,
      pixels: this.framebuffer.pixels.slice(),
      version: this.version,
    };
  }

  onFrame(listener: FrameListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }
}
