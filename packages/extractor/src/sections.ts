const ATX_HEADING = /^(#{1,6})[ \t]+(.+?)[ \t]*#*[ \t]*$/;

export interface Section {
  label: string | null;
  text: string;
}

export interface SplitSectionsResult {
  sections: Section[];
  /** Label in effect at the end of the text, to carry into the next page. */
  lastLabel: string | null;
}

/**
 * Split Markdown-like text at ATX headings. Heading lines stay in the text
 * of the section they open; empty sections are dropped.
 */
export function splitSections(text: string, initialLabel: string | null = null): SplitSectionsResult {
  const sections: Section[] = [];
  let label = initialLabel;
  let lines: string[] = [];

  const flush = (): void => {
    const body = lines.join("\n").trim();
    if (body.length > 0) {
      sections.push({ label, text: body });
    }
    lines = [];
  };

  for (const line of text.split(/\r?\n/)) {
    const heading = ATX_HEADING.exec(line);
    if (heading?.[2]) {
      flush();
      label = heading[2].trim();
    }
    lines.push(line);
  }
  flush();

  return { sections, lastLabel: label };
}
