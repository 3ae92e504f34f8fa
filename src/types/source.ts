/**
 * Types shared by the block extractors, the block parser and the attributor.
 */

export type SourceKind = 'pdf' | 'md';

/** Which extractor produced a block. */
export type BlockOrigin = 'pdf' | 'markdown';

export type MarkdownDialect = 'standard' | 'community';

export type BlockDialect = MarkdownDialect | 'pdf';

/** A contiguous span of text believed to hold exactly one adversary. */
export interface RawBlock {
  text: string;
  origin: BlockOrigin;
  dialect: BlockDialect;
  /** 1-based page of the first line, PDF only. */
  page?: number;
  /** 0-based position of the block within its document. */
  index: number;
}

// ---------------------------------------------------------------------------
// PDF geometry
// ---------------------------------------------------------------------------

/** A positioned run of text. Coordinates use a top-left origin. */
export interface PdfFragment {
  text: string;
  x0: number;
  x1: number;
  top: number;
  bottom: number;
}

export interface PdfPage {
  /** 1-based. */
  pageNumber: number;
  width: number;
  height: number;
  fragments: PdfFragment[];
}

/** One line of linearized reading-order text. */
export interface PdfLine {
  text: string;
  page: number;
}

// ---------------------------------------------------------------------------
// Attribution
// ---------------------------------------------------------------------------

export interface SourceMatch {
  sourceName: string;
  sourcePage?: number;
}

export interface SourceDocument {
  fileName: string;
  displayName: string;
  kind: SourceKind;
  /** Normalized page text; Markdown documents have a single entry. */
  pages: string[];
}
