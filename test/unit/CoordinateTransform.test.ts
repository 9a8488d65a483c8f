import { describe, it, expect } from 'vitest';
import { forwardTransform, inverseTransform } from '../../src/CoordinateTransform';
import { DrawingAreaMetrics, VideoMetrics } from '../../src/types/BridgeState';

function area(overrides: Partial<DrawingAreaMetrics> = {}): DrawingAreaMetrics {
  return { w: 1920, h: 1080, ml: 0, mr: 0, mt: 0, mb: 0, ...overrides };
}

describe('CoordinateTransform', () => {
  describe('forwardTransform', () => {
    it('should map the center of an unscaled drawing area', () => {
      expect(forwardTransform({ x: 960, y: 540 }, area(), { w: 1280, h: 720 })).toEqual({
        x: 640,
        y: 360,
      });
    });

    it('should clamp positions inside the left margin to zero', () => {
      const result = forwardTransform({ x: 50, y: 540 }, area({ ml: 100 }), { w: 1280, h: 720 });
      expect(result?.x).toBe(0);
    });

    it('should clamp positions past the drawing area to the video size', () => {
      expect(forwardTransform({ x: 2500, y: 1500 }, area(), { w: 1280, h: 720 })).toEqual({
        x: 1280,
        y: 720,
      });
    });

    it('should offset by the margins', () => {
      const metrics = area({ ml: 240, mr: 240 });
      // dx = 1440, (960 - 240) * 1280 / 1440 = 640
      expect(forwardTransform({ x: 960, y: 540 }, metrics, { w: 1280, h: 960 })).toEqual({
        x: 640,
        y: 480,
      });
    });

    it('should truncate toward zero', () => {
      // 1 * 1280 / 1920 = 0.67
      expect(forwardTransform({ x: 1, y: 1 }, area(), { w: 1280, h: 720 })).toEqual({
        x: 0,
        y: 0,
      });
    });

    it('should return null when the drawing area has no width', () => {
      expect(forwardTransform({ x: 10, y: 10 }, area({ w: 0 }), { w: 1280, h: 720 })).toBeNull();
    });

    it('should return null when the margins consume the height', () => {
      expect(
        forwardTransform({ x: 10, y: 10 }, area({ mt: 540, mb: 540 }), { w: 1280, h: 720 })
      ).toBeNull();
    });
  });

  describe('inverseTransform', () => {
    it('should map remote pixels back into the drawing area', () => {
      expect(inverseTransform({ x: 640, y: 360 }, area(), { w: 1280, h: 720 })).toEqual({
        x: 960,
        y: 540,
      });
    });

    it('should add the margins', () => {
      expect(
        inverseTransform({ x: 0, y: 0 }, area({ ml: 240, mr: 240 }), { w: 1280, h: 960 })
      ).toEqual({ x: 240, y: 0 });
    });

    it('should clamp to the drawing area bounds', () => {
      // x: 2000 * 1920 / 1280 = 3000, y: -10 * 1080 / 720 = -15
      expect(inverseTransform({ x: 2000, y: -10 }, area(), { w: 1280, h: 720 })).toEqual({
        x: 1920,
        y: 0,
      });
    });

    it('should return null before the video size is known', () => {
      expect(inverseTransform({ x: 10, y: 10 }, area(), { w: 0, h: 0 })).toBeNull();
      expect(inverseTransform({ x: 10, y: 10 }, area(), { w: 1280, h: 0 })).toBeNull();
    });
  });

  describe('round trip', () => {
    const cases: Array<{ name: string; metrics: DrawingAreaMetrics; video: VideoMetrics }> = [
      { name: 'downscaled video', metrics: area(), video: { w: 1280, h: 720 } },
      {
        name: 'pillarboxed video',
        metrics: area({ ml: 240, mr: 240 }),
        video: { w: 1280, h: 960 },
      },
      {
        name: 'upscaled video',
        metrics: area({ w: 1280, h: 720 }),
        video: { w: 2560, h: 1440 },
      },
    ];

    for (const { name, metrics, video } of cases) {
      it(`should reproduce positions within one unit for ${name}`, () => {
        for (let x = metrics.ml; x <= metrics.w - metrics.mr; x += 13) {
          for (let y = metrics.mt; y <= metrics.h - metrics.mb; y += 17) {
            const remote = forwardTransform({ x, y }, metrics, video);
            expect(remote).not.toBeNull();
            if (!remote) {
              continue;
            }
            const back = inverseTransform(remote, metrics, video);
            expect(back).not.toBeNull();
            if (!back) {
              continue;
            }
            expect(Math.abs(back.x - x)).toBeLessThanOrEqual(1);
            expect(Math.abs(back.y - y)).toBeLessThanOrEqual(1);
          }
        }
      });
    }
  });
});
