/**
 * Sectioned requirements documents (PRDs).
 *
 * A section starts at any `# ` or `## ` heading and runs until the next one.
 * Text before the first heading belongs to no section.
 */

const BULLET_MARKER = /^[-*•]\s*/;
const CODE_SPAN = /`[^`]*`/g;
const BOLD = /\*\*([^*]*)\*\*/g;
const LINK = /\[([^\]]+)\]\([^)]+\)/g;

/**
 * Split a document into named sections keyed by heading text.
 * A repeated heading keeps the body of its last occurrence.
 */
export function parseSections(text: string): Map<string, string> {
  const sections = new Map<string, string>();
  let currentSection: string | null = null;
  let currentContent: string[] = [];

  const close = (): void => {
    if (currentSection !== null) {
      sections.set(currentSection, currentContent.join('\n'));
    }
  };

  for (const line of text.split('\n')) {
    let heading: string | null = null;
    if (line.startsWith('# ')) {
      heading = line.slice(2).trim();
    } else if (line.startsWith('## ')) {
      heading = line.slice(3).trim();
    }

    if (heading !== null) {
      close();
      currentSection = heading;
      currentContent = [];
    } else {
      currentContent.push(line);
    }
  }
  close();

  return sections;
}

/**
 * Pull bullet items out of a section body, stripping Markdown formatting:
 * inline code is removed, bold is unwrapped and links keep their text.
 */
export function extractBulletPoints(content: string): string[] {
  const points: string[] = [];
  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (!line || !BULLET_MARKER.test(line)) continue;

    const cleaned = line
      .replace(BULLET_MARKER, '')
      .replace(CODE_SPAN, '')
      .replace(BOLD, '$1')
      .replace(LINK, '$1');
    if (cleaned) {
      points.push(cleaned);
    }
  }
  return points;
}
