/* ============================================================================
   stream-assembler.ts
   Reassembles incremental content fragments into the final reply.

   Text is the concatenation of fragments in arrival order. When fragments
   carry a sequence marker it must strictly increase; a repeat or a step
   backwards means the stream cannot be trusted and the attempt fails.
============================================================================ */

import { DirectTransportError } from "./errors.js";

export interface StreamFragment {
  content: string;
  /** Monotonic sequence marker, when the upstream sends one. */
  seq?: number;
  /** "think" fragments belong to the reasoning trace, not the answer. */
  phase?: string;
}

export class StreamAssembler {
  private readonly answer: string[] = [];
  private readonly thinking: string[] = [];
  private lastSeq: number | null = null;
  private fragments = 0;

  push(fragment: StreamFragment): void {
    if (fragment.seq !== undefined) {
      if (this.lastSeq !== null && fragment.seq <= this.lastSeq) {
        throw new DirectTransportError(
          "StreamReorderDetected",
          `Fragment seq ${fragment.seq} arrived after seq ${this.lastSeq}`,
        );
      }
      this.lastSeq = fragment.seq;
    }

    this.fragments++;
    if (fragment.phase === "think") this.thinking.push(fragment.content);
    else this.answer.push(fragment.content);
  }

  get text(): string {
    return this.answer.join("");
  }

  /** Reasoning trace, or null when the stream had none. */
  get reasoning(): string | null {
    return this.thinking.length > 0 ? this.thinking.join("") : null;
  }

  get fragmentCount(): number {
    return this.fragments;
  }
}

/** Convenience for whole-array reassembly. */
export function reassemble(fragments: Iterable<StreamFragment>): string {
  const assembler = new StreamAssembler();
  for (const fragment of fragments) assembler.push(fragment);
  return assembler.text;
}
