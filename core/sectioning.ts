const sectionBySize = (text: string, size: number): string[] => {
  if (!Number.isInteger(size) || size < 1) {
    throw new Error(`Section size must be a positive integer, got ${size}.`);
  }
  const sections: string[] = [];
  for (let start = 0; start < text.length; start += size) {
    sections.push(text.slice(start, start + size));
  }
  return sections;
};

// Each delimiter match stays attached to the text that follows it.
const sectionByRegex = (text: string, pattern: string): string[] => {
  const splitter = new RegExp(`(${pattern})`);
  const header = new RegExp(`^(?:${pattern})`);
  const parts = text.split(splitter);
  const sections: string[] = [];

  let index = 0;
  while (index < parts.length) {
    const part = parts[index] ?? "";
    if (index + 1 < parts.length && header.test(part)) {
      sections.push(part + (parts[index + 1] ?? ""));
      index += 2;
      continue;
    }
    if (part.length > 0) {
      sections.push(part);
    }
    index += 1;
  }

  return sections;
};

export { sectionByRegex, sectionBySize };
