/**
 * Unit tests for RecordingCanvas and the shared canvas lifecycle
 */
import { describe, it, expect, beforeEach } from 'vitest';
import { RecordingCanvas, textOps } from '../../../lib/canvas/RecordingCanvas';
import { Style } from '../../../lib/style/Style';

describe('RecordingCanvas', () => {
  let canvas: RecordingCanvas;
  const body = new Style({ fontName: 'Helvetica', fontSize: 10 });

  beforeEach(() => {
    canvas = new RecordingCanvas({ width: 612, height: 792 });
  });

  describe('page lifecycle', () => {
    it('should count pages as they begin', () => {
      expect(canvas.pageCount).toBe(0);
      expect(canvas.hasOpenPage).toBe(false);

      canvas.beginPage();

      expect(canvas.pageCount).toBe(1);
      expect(canvas.hasOpenPage).toBe(true);
    });

    it('should start every page without a style', () => {
      canvas.beginPage();
      canvas.setStyle(body);
      canvas.endPage();

      expect(canvas.currentStyle).toBeNull();
      canvas.beginPage();
      expect(canvas.currentStyle).toBeNull();
    });

    it('should refuse to begin a page while one is open', () => {
      canvas.beginPage();

      expect(() => canvas.beginPage()).toThrow('Page 1 is still open');
    });

    it('should refuse to draw outside a page', () => {
      expect(() => canvas.drawLine(0, 0, 1, 1)).toThrow('No page is open; call beginPage() first');
    });

    it('should refuse to draw text before a style is set', () => {
      canvas.beginPage();

      expect(() => canvas.drawText('x', 0, 0)).toThrow('No style set on page 1 before drawing text');
    });

    it('should refuse to close with a page open', () => {
      canvas.beginPage();

      expect(() => canvas.close()).toThrow('Cannot close the canvas while page 1 is open');
    });

    it('should be unusable after close()', () => {
      canvas.close();

      expect(() => canvas.beginPage()).toThrow('Canvas is closed');
      expect(() => canvas.abort()).not.toThrow();
    });

    it('should drop everything on abort()', () => {
      canvas.beginPage();
      canvas.abort();
      canvas.abort();

      expect(canvas.hasOpenPage).toBe(false);
      expect(() => canvas.close()).toThrow('Canvas is aborted');
    });
  });

  describe('recording', () => {
    it('should keep every draw call per page', () => {
      canvas.beginPage();
      canvas.setStyle(body);
      canvas.drawText('Hello', 50, 700, { align: 'center' });
      canvas.drawImage('chart.png', 50, 400, 500, 250);
      canvas.endPage();
      canvas.beginPage();
      canvas.drawRect(10, 20, 30, 40, { fill: { r: 1, g: 0, b: 0 } });
      canvas.endPage();

      const recorded = canvas.close();

      expect(recorded.pageSize).toEqual({ width: 612, height: 792 });
      expect(recorded.pages.map(page => page.number)).toEqual([1, 2]);
      expect(recorded.pages[0].ops).toEqual([
        { type: 'text', text: 'Hello', x: 50, y: 700, align: 'center', style: body },
        { type: 'image', source: 'chart.png', x: 50, y: 400, width: 500, height: 250 }
      ]);
      expect(recorded.pages[1].ops).toEqual([
        { type: 'rect', x: 10, y: 20, width: 30, height: 40, fill: { r: 1, g: 0, b: 0 } }
      ]);
    });

    it('should default lines to 1pt black', () => {
      canvas.beginPage();
      canvas.drawLine(0, 10, 100, 10);
      canvas.endPage();

      expect(canvas.close().pages[0].ops).toEqual([
        { type: 'line', x1: 0, y1: 10, x2: 100, y2: 10, color: { r: 0, g: 0, b: 0 }, thickness: 1 }
      ]);
    });

    it('should pick out text draws with textOps()', () => {
      canvas.beginPage();
      canvas.setStyle(body);
      canvas.drawLine(0, 10, 100, 10);
      canvas.drawText('a', 0, 0);
      canvas.drawText('b', 0, 0);
      canvas.endPage();

      expect(textOps(canvas.close().pages[0]).map(op => op.text)).toEqual(['a', 'b']);
    });
  });
});
