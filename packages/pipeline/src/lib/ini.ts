// ─── Types ───────────────────────────────────────────────────────────────────

export type IniValue = string | number;

export type IniLine =
  | { readonly kind: 'entry'; readonly key: string; readonly value: string }
  | { readonly kind: 'blank' };

// ─── Value helpers ───────────────────────────────────────────────────────────

/** OMNeT++ string literal. */
export function quoted(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function xmldoc(file: string): string {
  return `xmldoc(${quoted(file)})`;
}

/** Value with a unit suffix, e.g. `600m`, `3600s`. */
export function withUnit(value: number, unit: string, fractionDigits?: number): string {
  return `${fractionDigits === undefined ? String(value) : value.toFixed(fractionDigits)}${unit}`;
}

// ─── IniDocument ─────────────────────────────────────────────────────────────

/**
 * Ordered INI document (OMNeT++ flavour). Keys may repeat across sections but
 * must be unique within one.
 */
export class IniDocument {
  private readonly sections: Array<{ name: string; lines: IniLine[] }> = [];

  section(name: string): IniSectionBuilder {
    const existing = this.sections.find((s) => s.name === name);
    if (existing) {
      return new IniSectionBuilder(existing.lines);
    }
    const created: { name: string; lines: IniLine[] } = { name, lines: [] };
    this.sections.push(created);
    return new IniSectionBuilder(created.lines);
  }

  /** Value of `key` in `section`, or undefined. */
  get(section: string, key: string): string | undefined {
    const found = this.sections.find((s) => s.name === section);
    for (const line of found?.lines ?? []) {
      if (line.kind === 'entry' && line.key === key) return line.value;
    }
    return undefined;
  }

  toString(): string {
    const out: string[] = [];
    this.sections.forEach((section, index) => {
      if (index > 0) out.push('');
      out.push(`[${section.name}]`);
      for (const line of section.lines) {
        out.push(line.kind === 'entry' ? `${line.key} = ${line.value}` : '');
      }
    });
    return `${out.join('\n').replace(/\n+$/, '')}\n`;
  }
}

export class IniSectionBuilder {
  constructor(private readonly lines: IniLine[]) {}

  set(key: string, value: IniValue): this {
    if (this.lines.some((line) => line.kind === 'entry' && line.key === key)) {
      throw new Error(`Duplicate ini key '${key}'`);
    }
    this.lines.push({ kind: 'entry', key, value: String(value) });
    return this;
  }

  blank(): this {
    this.lines.push({ kind: 'blank' });
    return this;
  }
}
