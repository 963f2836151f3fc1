/**
 * Minimal WordPiece `tokenizer.json` for embedding tests.
 */

export const VOCAB = {
  '[PAD]': 0,
  '[UNK]': 1,
  '[CLS]': 2,
  '[SEP]': 3,
  phish: 4,
  '##ing': 5,
  email: 6,
  ',': 7,
  cafe: 8,
  credential: 9,
  dump: 10,
  '!': 11,
};

export function createTokenizerJson(normalizer: Record<string, unknown> = { type: 'BertNormalizer', lowercase: true, strip_accents: null }) {
  return {
    version: '1.0',
    normalizer,
    pre_tokenizer: { type: 'BertPreTokenizer' },
    model: {
      type: 'WordPiece',
      unk_token: '[UNK]',
      continuing_subword_prefix: '##',
      max_input_chars_per_word: 100,
      vocab: VOCAB,
    },
  };
}
