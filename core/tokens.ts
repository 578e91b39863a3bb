// Rough estimate of four characters per token; no tokenizer is bundled.
const CHARS_PER_TOKEN = 4;

const countTokens = (text: string) => {
  if (text.length === 0) {
    return 0;
  }
  return Math.max(1, Math.floor(text.length / CHARS_PER_TOKEN));
};

export { countTokens };
