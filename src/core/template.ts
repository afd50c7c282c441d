import path from 'path';
import type { ArtifactRef, ReleaseContext } from '../types/index.js';
import { TemplateError } from './errors.js';

type TemplateFunction = (...args: string[]) => string;

const FUNCTIONS: Record<string, { arity: number; fn: TemplateFunction }> = {
  tolower: { arity: 1, fn: s => s.toLowerCase() },
  toupper: { arity: 1, fn: s => s.toUpperCase() },
  trim: { arity: 1, fn: s => s.trim() },
  trimprefix: { arity: 2, fn: (s, prefix) => (s.startsWith(prefix) ? s.slice(prefix.length) : s) },
  trimsuffix: { arity: 2, fn: (s, suffix) => (suffix && s.endsWith(suffix) ? s.slice(0, -suffix.length) : s) },
  replace: { arity: 3, fn: (s, from, to) => s.split(from).join(to) },
};

// Quoted strings, pipe separators, bare words
const TOKEN_PATTERN = /"(?:[^"\\]|\\.)*"|\||[^\s|"]+/g;

const COMPOUND_EXTENSIONS = ['.tar.gz', '.tar.xz', '.tar.zst', '.tar.bz2'];

function artifactExt(name: string): string {
  return COMPOUND_EXTENSIONS.find(ext => name.endsWith(ext)) ?? path.extname(name);
}

/** Index of the `}}` closing an action, skipping quoted strings. -1 if none. */
function findClose(text: string, from: number): number {
  for (let i = from; i < text.length; i++) {
    if (text[i] === '"') {
      i++;
      while (i < text.length && text[i] !== '"') {
        if (text[i] === '\\') i++;
        i++;
      }
    } else if (text.startsWith('}}', i)) {
      return i;
    }
  }
  return -1;
}

/**
 * Expands `{{ .Field }}` placeholders against a release context.
 *
 * Supports field lookups, `.Env.NAME`, a handful of string functions and
 * `|` pipelines, where the piped value becomes the last argument. `{{-` and
 * `-}}` trim the whitespace next to the action.
 */
export class Template {
  private fields: Map<string, string>;

  constructor(private ctx: ReleaseContext, artifact?: ArtifactRef) {
    const { semver } = ctx;
    this.fields = new Map(Object.entries({
      ProjectName: ctx.projectName,
      Version: ctx.version,
      RawVersion: `${semver.major}.${semver.minor}.${semver.patch}`,
      Tag: ctx.tag,
      Major: String(semver.major),
      Minor: String(semver.minor),
      Patch: String(semver.patch),
      Prerelease: semver.prerelease,
    }));

    if (artifact) {
      this.fields.set('ArtifactName', artifact.name);
      this.fields.set('ArtifactPath', artifact.path);
      this.fields.set('ArtifactExt', artifactExt(artifact.name));
      this.fields.set('Os', artifact.goos);
      this.fields.set('Arch', artifact.goarch);
      this.fields.set('Amd64', artifact.goamd64);
    }
  }

  withArtifact(artifact: ArtifactRef): Template {
    return new Template(this.ctx, artifact);
  }

  apply(text: string): string {
    let out = '';
    let pos = 0;

    for (;;) {
      const open = text.indexOf('{{', pos);
      if (open === -1) {
        return out + text.slice(pos);
      }

      let literal = text.slice(pos, open);
      let start = open + 2;
      if (/^-\s/.test(text.slice(start, start + 2))) {
        literal = literal.trimEnd();
        start += 1;
      }

      const close = findClose(text, start);
      if (close === -1) {
        throw new TemplateError(text, 'unclosed action');
      }

      let end = close;
      let trimRight = false;
      if (end - 2 >= start && text[end - 1] === '-' && /\s/.test(text[end - 2])) {
        end -= 1;
        trimRight = true;
      }

      out += literal + this.evaluate(text.slice(start, end), text);
      pos = close + 2;
      if (trimRight) {
        while (pos < text.length && /\s/.test(text[pos])) pos++;
      }
    }
  }

  private evaluate(action: string, template: string): string {
    const tokens = action.match(TOKEN_PATTERN) ?? [];
    if (tokens.length === 0) {
      throw new TemplateError(template, 'missing value for command');
    }

    const stages: string[][] = [[]];
    for (const token of tokens) {
      if (token === '|') stages.push([]);
      else stages[stages.length - 1].push(token);
    }

    let piped: string | undefined;
    for (const stage of stages) {
      if (stage.length === 0) {
        throw new TemplateError(template, 'missing command in pipeline');
      }
      piped = this.command(stage, piped, template);
    }
    return piped ?? '';
  }

  private command(tokens: string[], piped: string | undefined, template: string): string {
    const [head, ...rest] = tokens;
    const func = Object.hasOwn(FUNCTIONS, head) ? FUNCTIONS[head] : undefined;

    if (!func) {
      if (!head.startsWith('.') && !head.startsWith('"')) {
        throw new TemplateError(template, `function "${head}" not defined`);
      }
      if (rest.length > 0 || piped !== undefined) {
        throw new TemplateError(template, `can't give argument to non-function ${head}`);
      }
      return this.operand(head, template);
    }

    const args = rest.map(token => this.operand(token, template));
    if (piped !== undefined) args.push(piped);
    if (args.length !== func.arity) {
      throw new TemplateError(
        template,
        `wrong number of args for ${head}: want ${func.arity} got ${args.length}`,
      );
    }
    return func.fn(...args);
  }

  private operand(token: string, template: string): string {
    if (token.startsWith('"')) {
      try {
        return String(JSON.parse(token));
      } catch {
        throw new TemplateError(template, `malformed string ${token}`);
      }
    }
    if (token.startsWith('.')) {
      return this.lookup(token, template);
    }
    throw new TemplateError(template, `function "${token}" not defined`);
  }

  private lookup(token: string, template: string): string {
    const parts = token.slice(1).split('.');

    if (parts[0] === 'Env' && parts.length === 2) {
      const key = parts[1];
      if (!Object.hasOwn(this.ctx.env, key)) {
        throw new TemplateError(template, `map has no entry for key "${key}"`);
      }
      return this.ctx.env[key];
    }

    const value = parts.length === 1 ? this.fields.get(parts[0]) : undefined;
    if (value === undefined) {
      throw new TemplateError(template, `can't evaluate field ${token.slice(1)}`);
    }
    return value;
  }
}
