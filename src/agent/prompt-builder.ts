/**
 * System prompt built from named sections, so front-ends can drop or swap
 * one without copying the rest.
 */

// ── Section Interface ────────────────────────────────────────────────────

export interface PromptSection {
  /** Unique section identifier. */
  name: string;
  /** Build the section text. Return empty string to skip. */
  build(ctx: PromptContext): string;
}

export interface PromptContext {
  /** Session workspace */
  cwd: string;
  model?: string;
  /** Names of the tools declared to the model */
  toolNames: string[];
  /** Confirm-class tools need user approval; the model should expect refusals. */
  approvalRequired: boolean;
  now?: Date;
}

// ── Built-In Sections ────────────────────────────────────────────────────

export class IdentitySection implements PromptSection {
  name = 'identity';
  build(_ctx: PromptContext): string {
    return "You are a command-line assistant with local tools. Answer the user's request, calling tools when they help.";
  }
}

export class RulesSection implements PromptSection {
  name = 'rules';
  build(ctx: PromptContext): string {
    const has = (n: string) => ctx.toolNames.includes(n);
    const rules = ['- Use relative paths; they resolve against the working directory.'];
    if (has('read_file') && has('edit_file')) {
      rules.push('- Read a file before editing it. edit_file needs the exact text to replace.');
    }
    if (has('search_files')) {
      rules.push('- Locate code with search_files instead of reading every file in a directory.');
    }
    if (has('execute_command')) {
      rules.push('- Each execute_command call is a fresh shell; `cd` does not persist between calls.');
    }
    rules.push('- Tool arguments are strict JSON objects.');
    rules.push('- When a tool result starts with "error:", adapt instead of repeating the same call.');
    rules.push('- Be concise. When done, answer in plain text without calling more tools.');
    return `Rules:\n${rules.join('\n')}`;
  }
}

export class SafetySection implements PromptSection {
  name = 'safety';
  build(ctx: PromptContext): string {
    const lines = ['Some commands and paths are blocked by policy. A blocked call is not retried with a rephrased command.'];
    if (ctx.approvalRequired) {
      lines.push('Writes, commits and shell commands may be declined by the user ("user declined"); ask or choose another approach.');
    }
    return lines.join('\n');
  }
}

export class DateTimeSection implements PromptSection {
  name = 'datetime';
  build(ctx: PromptContext): string {
    const now = ctx.now ?? new Date();
    return `Current date: ${now.toISOString().slice(0, 10)}`;
  }
}

export class RuntimeSection implements PromptSection {
  name = 'runtime';
  build(ctx: PromptContext): string {
    const parts: string[] = [];
    if (ctx.cwd) parts.push(`Working directory: ${ctx.cwd}`);
    if (ctx.model) parts.push(`Model: ${ctx.model}`);
    return parts.join('\n');
  }
}

// ── Builder ──────────────────────────────────────────────────────────────

export class SystemPromptBuilder {
  private sections: PromptSection[] = [];

  /** Create a builder with the default section set. */
  static withDefaults(): SystemPromptBuilder {
    return new SystemPromptBuilder()
      .addSection(new IdentitySection())
      .addSection(new RulesSection())
      .addSection(new SafetySection())
      .addSection(new RuntimeSection())
      .addSection(new DateTimeSection());
  }

  addSection(section: PromptSection): this {
    this.sections.push(section);
    return this;
  }

  /** Replace a section by name, or append if not found. */
  replaceSection(name: string, section: PromptSection): this {
    const idx = this.sections.findIndex((s) => s.name === name);
    if (idx >= 0) {
      this.sections[idx] = section;
    } else {
      this.sections.push(section);
    }
    return this;
  }

  removeSection(name: string): this {
    this.sections = this.sections.filter((s) => s.name !== name);
    return this;
  }

  sectionNames(): string[] {
    return this.sections.map((s) => s.name);
  }

  /** Build the complete system prompt. */
  build(ctx: PromptContext): string {
    const parts: string[] = [];
    for (const section of this.sections) {
      const text = section.build(ctx).trim();
      if (text) parts.push(text);
    }
    return parts.join('\n\n');
  }
}

export function buildDefaultSystemPrompt(ctx: Partial<PromptContext> = {}): string {
  return SystemPromptBuilder.withDefaults().build({
    cwd: ctx.cwd ?? process.cwd(),
    toolNames: ctx.toolNames ?? [],
    approvalRequired: ctx.approvalRequired ?? true,
    model: ctx.model,
    now: ctx.now,
  });
}
