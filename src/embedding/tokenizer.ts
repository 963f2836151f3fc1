/**
 * BERT WordPiece tokenizer driven by a Hugging Face `tokenizer.json`.
 *
 * Normalization and pre-tokenization follow BertNormalizer and
 * BertPreTokenizer: control characters dropped, CJK ideographs split out,
 * optional lowercasing and accent stripping, whitespace and punctuation
 * splits. Each sequence is framed as `[CLS] ... [SEP]`.
 */

import { z } from 'zod';

const TokenizerJsonSchema = z
  .object({
    normalizer: z
      .object({
        lowercase: z.boolean().optional(),
        strip_accents: z.boolean().nullable().optional(),
      })
      .passthrough()
      .nullable()
      .optional(),
    model: z
      .object({
        type: z.literal('WordPiece'),
        vocab: z.record(z.number().int().nonnegative()),
        unk_token: z.string().default('[UNK]'),
        continuing_subword_prefix: z.string().default('##'),
        max_input_chars_per_word: z.number().int().positive().default(100),
      })
      .passthrough(),
  })
  .passthrough();

/** Matches sentence-transformers' max_seq_length for the MiniLM family. */
export const DEFAULT_MAX_LENGTH = 256;

export interface TokenizerSettings {
  vocab: ReadonlyMap<string, number>;
  unkToken?: string;
  subwordPrefix?: string;
  maxCharsPerWord?: number;
  lowercase?: boolean;
  /** Defaults to the lowercase setting, as BertNormalizer does. */
  stripAccents?: boolean;
  maxLength?: number;
}

const CONTROL = /[\p{Cc}\p{Cf}\u{FFFD}]/gu;
const WHITESPACE_CONTROL = /[\t\n\r]/;
const CJK =
  /[\u{3400}-\u{4DBF}\u{4E00}-\u{9FFF}\u{F900}-\u{FAFF}\u{20000}-\u{2A6DF}\u{2A700}-\u{2B73F}\u{2B740}-\u{2B81F}\u{2B820}-\u{2CEAF}\u{2F800}-\u{2FA1F}]/gu;
const PUNCTUATION = /([\p{P}$+<=>^`|~])/u;
const COMBINING_MARK = /\p{Mn}/gu;

export class WordPieceTokenizer {
  private readonly vocab: ReadonlyMap<string, number>;
  private readonly subwordPrefix: string;
  private readonly maxCharsPerWord: number;
  private readonly lowercase: boolean;
  private readonly stripAccents: boolean;
  private readonly maxLength: number;
  private readonly unkId: number;
  private readonly clsId: number;
  private readonly sepId: number;
  readonly padId: number;

  constructor(settings: TokenizerSettings) {
    this.vocab = settings.vocab;
    this.subwordPrefix = settings.subwordPrefix ?? '##';
    this.maxCharsPerWord = settings.maxCharsPerWord ?? 100;
    this.lowercase = settings.lowercase ?? true;
    this.stripAccents = settings.stripAccents ?? this.lowercase;
    this.maxLength = settings.maxLength ?? DEFAULT_MAX_LENGTH;

    if (this.maxLength < 2) {
      throw new RangeError(`maxLength must be at least 2, got ${this.maxLength}`);
    }

    this.unkId = this.specialId(settings.unkToken ?? '[UNK]');
    this.clsId = this.specialId('[CLS]');
    this.sepId = this.specialId('[SEP]');
    this.padId = this.specialId('[PAD]');
  }

  /**
   * Build a tokenizer from parsed `tokenizer.json` content. Throws a
   * ZodError when the file does not describe a WordPiece model.
   */
  static fromJson(json: unknown, maxLength?: number): WordPieceTokenizer {
    const parsed = TokenizerJsonSchema.parse(json);
    const lowercase = parsed.normalizer?.lowercase ?? true;
    const stripAccents = parsed.normalizer?.strip_accents ?? undefined;

    return new WordPieceTokenizer({
      vocab: new Map(Object.entries(parsed.model.vocab)),
      unkToken: parsed.model.unk_token,
      subwordPrefix: parsed.model.continuing_subword_prefix,
      maxCharsPerWord: parsed.model.max_input_chars_per_word,
      lowercase,
      ...(stripAccents !== undefined ? { stripAccents } : {}),
      ...(maxLength !== undefined ? { maxLength } : {}),
    });
  }

  /** Token ids for one sequence, truncated to maxLength including specials. */
  encode(text: string): number[] {
    const ids: number[] = [];
    for (const word of this.preTokenize(this.normalize(text))) {
      ids.push(...this.wordPieces(word));
    }
    return [this.clsId, ...ids.slice(0, this.maxLength - 2), this.sepId];
  }

  normalize(text: string): string {
    let out = text.replace(CONTROL, (ch) => (WHITESPACE_CONTROL.test(ch) ? ' ' : ''));
    out = out.replace(CJK, ' $& ');
    if (this.lowercase) out = out.toLowerCase();
    if (this.stripAccents) out = out.normalize('NFD').replace(COMBINING_MARK, '');
    return out;
  }

  preTokenize(text: string): string[] {
    return text
      .split(/\s+/u)
      .flatMap((word) => word.split(PUNCTUATION))
      .filter((piece) => piece.length > 0);
  }

  /** Greedy longest-match-first split of one word. */
  private wordPieces(word: string): number[] {
    const chars = Array.from(word);
    if (chars.length > this.maxCharsPerWord) return [this.unkId];

    const ids: number[] = [];
    let start = 0;
    while (start < chars.length) {
      let end = chars.length;
      let match: number | undefined;
      while (start < end) {
        const piece = (start > 0 ? this.subwordPrefix : '') + chars.slice(start, end).join('');
        match = this.vocab.get(piece);
        if (match !== undefined) break;
        end--;
      }
      if (match === undefined) return [this.unkId];
      ids.push(match);
      start = end;
    }
    return ids;
  }

  private specialId(token: string): number {
    const id = this.vocab.get(token);
    if (id === undefined) {
      throw new Error(`Tokenizer vocabulary has no ${token} token`);
    }
    return id;
  }
}
