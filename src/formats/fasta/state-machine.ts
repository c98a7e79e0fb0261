/**
 * Metadata accumulator for FASTA code streams
 *
 * Tracks the current description/comment block, the two changed flags and the
 * read position for one parse session. The flags are raised when a metadata
 * block ends and lowered again as soon as one code has reported them, so a
 * writer re-emits each block exactly once.
 *
 * @remarks
 * The state machine transitions:
 * IDLE → IN_METADATA_BLOCK (metadata line: start a fresh block)
 * IN_METADATA_BLOCK → IN_METADATA_BLOCK (metadata line: append)
 * IN_METADATA_BLOCK → IDLE (code line: raise both changed flags)
 * Blank lines never reach the accumulator.
 */

import { isMetadataLine } from "./classifier";
import { createCode, createCodeRecord } from "./code";
import type { CodeRecord, LineClassification } from "./types";
import { MetadataState } from "./types";

export class MetadataAccumulator {
  private state: MetadataState = MetadataState.IDLE;
  private descriptions: readonly string[] = [];
  private comments: readonly string[] = [];
  // Lists of the block being read; frozen into the fields above when it closes
  private blockDescriptions: string[] = [];
  private blockComments: string[] = [];
  private descriptionChanged = false;
  private commentChanged = false;
  private nextPosition = 0;

  get currentState(): MetadataState {
    return this.state;
  }

  /** Number of codes emitted so far */
  get position(): number {
    return this.nextPosition;
  }

  /**
   * True while a metadata block has been read but no code has followed it yet
   */
  get hasPendingBlock(): boolean {
    return this.state === MetadataState.IN_METADATA_BLOCK;
  }

  /**
   * Apply one classified line to the accumulator state
   */
  accept(line: LineClassification): void {
    if (isMetadataLine(line)) {
      if (this.state === MetadataState.IDLE) {
        this.startBlock();
      }
      // Marker-only lines open a block but add nothing to it
      if (line.text.trim().length > 0) {
        if (line.kind === "description") {
          this.blockDescriptions.push(line.text);
        } else {
          this.blockComments.push(line.text);
        }
      }
      return;
    }

    if (line.kind === "code" && this.state === MetadataState.IN_METADATA_BLOCK) {
      this.descriptions = Object.freeze(this.blockDescriptions);
      this.comments = Object.freeze(this.blockComments);
      this.descriptionChanged = true;
      this.commentChanged = true;
      this.state = MetadataState.IDLE;
    }
  }

  /**
   * Record the next code with a snapshot of the current metadata.
   *
   * The changed flags are cleared after being read, so only the first code
   * after a block reports them.
   */
  emit(value: string): CodeRecord {
    const record = createCodeRecord(
      createCode(value, this.nextPosition),
      Object.freeze({
        descriptions: this.descriptions,
        comments: this.comments,
        descriptionChanged: this.descriptionChanged,
        commentChanged: this.commentChanged,
      })
    );

    this.nextPosition++;
    this.descriptionChanged = false;
    this.commentChanged = false;

    return record;
  }

  private startBlock(): void {
    this.state = MetadataState.IN_METADATA_BLOCK;
    this.blockDescriptions = [];
    this.blockComments = [];
    this.descriptionChanged = false;
    this.commentChanged = false;
  }
}
