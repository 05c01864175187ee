/**
 * deb822 control file parsing
 *
 * Used for the dpkg status file, Packages indices, Release files,
 * deb822 .sources files and APT preferences.
 */

/**
 * One paragraph of a control file. Field names are case-insensitive,
 * so lookups go through {@link field}.
 */
export interface ControlParagraph {
  /** Field values keyed by lower-cased field name */
  fields: Map<string, string>;
  /** 1-based line number the paragraph starts on */
  line: number;
}

/**
 * Split control file content into paragraphs.
 *
 * Continuation lines (leading space or tab) are appended to the previous
 * field with a newline; a lone "." continuation stands for an empty line.
 * Comment lines starting with "#" are skipped.
 */
export function parseControl(content: string): ControlParagraph[] {
  const paragraphs: ControlParagraph[] = [];
  const lines = content.replace(/\r\n/g, '\n').split('\n');

  let fields = new Map<string, string>();
  let startLine = 0;
  let currentKey = '';

  const flush = () => {
    if (fields.size > 0) {
      paragraphs.push({ fields, line: startLine });
    }
    fields = new Map<string, string>();
    currentKey = '';
  };

  lines.forEach((line, index) => {
    if (line.trim() === '') {
      flush();
      return;
    }
    if (line.startsWith('#')) {
      return;
    }

    if (line.startsWith(' ') || line.startsWith('\t')) {
      if (currentKey) {
        const continuation = line.trim() === '.' ? '' : line.substring(1);
        fields.set(currentKey, `${fields.get(currentKey) ?? ''}\n${continuation}`);
      }
      return;
    }

    const colonIndex = line.indexOf(':');
    if (colonIndex <= 0) {
      return;
    }

    if (fields.size === 0) {
      startLine = index + 1;
    }
    currentKey = line.substring(0, colonIndex).trim().toLowerCase();
    fields.set(currentKey, line.substring(colonIndex + 1).trim());
  });

  flush();
  return paragraphs;
}

/**
 * Look up a field by name, case-insensitively
 */
export function field(paragraph: ControlParagraph, name: string): string | undefined {
  return paragraph.fields.get(name.toLowerCase());
}

/**
 * Interpret a boolean control field ("yes"/"no")
 */
export function booleanField(paragraph: ControlParagraph, name: string): boolean {
  const value = field(paragraph, name);
  return value !== undefined && value.trim().toLowerCase() === 'yes';
}

/**
 * Split a whitespace-separated list field
 */
export function listField(paragraph: ControlParagraph, name: string): string[] {
  const value = field(paragraph, name);
  if (!value) return [];
  return value.split(/\s+/).filter((item) => item.length > 0);
}

/**
 * Strip the OpenPGP clearsign armour from an InRelease file.
 * Content without armour is returned unchanged.
 */
export function stripClearsign(content: string): string {
  const lines = content.replace(/\r\n/g, '\n').split('\n');
  if (lines[0]?.trim() !== '-----BEGIN PGP SIGNED MESSAGE-----') {
    return content;
  }

  // Armour headers ("Hash: SHA512") run until the first empty line
  let start = 1;
  while (start < lines.length && lines[start].trim() !== '') {
    start++;
  }

  const body: string[] = [];
  for (let i = start + 1; i < lines.length; i++) {
    if (lines[i].trim() === '-----BEGIN PGP SIGNATURE-----') {
      break;
    }
    // Dash-escaped lines start with "- "
    body.push(lines[i].startsWith('- ') ? lines[i].substring(2) : lines[i]);
  }

  return body.join('\n');
}
