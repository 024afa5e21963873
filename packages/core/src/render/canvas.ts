/**
 * packages/core/src/render/canvas.ts — Paint command sink.
 *
 * The render layer emits a flat command stream: rectangles, text and a clip
 * stack. Positions are absolute. A backend replays the stream; tests keep
 * the recording and assert on it.
 */

export type PaintStyle = Readonly<{ fill?: string }>;

export type PaintOp =
  | Readonly<{ kind: "fillRect"; x: number; y: number; w: number; h: number; style?: PaintStyle }>
  | Readonly<{ kind: "drawText"; x: number; y: number; text: string; style?: PaintStyle }>
  | Readonly<{ kind: "pushClip"; x: number; y: number; w: number; h: number }>
  | Readonly<{ kind: "popClip" }>;

export interface PaintCanvas {
  fillRect(x: number, y: number, w: number, h: number, style?: PaintStyle): void;
  drawText(x: number, y: number, text: string, style?: PaintStyle): void;
  /** Push clipping rectangle onto the clip stack. */
  pushClip(x: number, y: number, w: number, h: number): void;
  /** Pop the most recent clipping rectangle. */
  popClip(): void;
}

export class RecordingCanvas implements PaintCanvas {
  readonly ops: PaintOp[] = [];
  private clipDepth = 0;

  get depth(): number {
    return this.clipDepth;
  }

  fillRect(x: number, y: number, w: number, h: number, style?: PaintStyle): void {
    this.ops.push(
      style ? { kind: "fillRect", x, y, w, h, style } : { kind: "fillRect", x, y, w, h },
    );
  }

  drawText(x: number, y: number, text: string, style?: PaintStyle): void {
    this.ops.push(
      style ? { kind: "drawText", x, y, text, style } : { kind: "drawText", x, y, text },
    );
  }

  pushClip(x: number, y: number, w: number, h: number): void {
    this.clipDepth++;
    this.ops.push({ kind: "pushClip", x, y, w, h });
  }

  popClip(): void {
    if (this.clipDepth > 0) this.clipDepth--;
    this.ops.push({ kind: "popClip" });
  }

  reset(): void {
    this.ops.length = 0;
    this.clipDepth = 0;
  }
}
