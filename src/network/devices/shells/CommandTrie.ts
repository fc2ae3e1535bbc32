/**
 * CommandTrie - Trie-based command parser for the router shell
 *
 * Supports:
 *   - Abbreviation matching ("sh" → "show", "d" → "del")
 *   - Ambiguity detection ("s" matches "send", "show" and "stats")
 *   - Positional arguments after an executable keyword
 *   - Usage lines built from the registered argument specs
 *   - Tab completion (unique prefix → complete, ambiguous → null)
 *
 * Each node in the trie represents a keyword. Children are possible next
 * keywords; executable nodes carry an action and their argument specs.
 */

export interface ParamSpec {
  name: string;
  description: string;
  optional?: boolean;
}

export type CommandAction = (args: string[]) => string;

export interface CommandNode {
  keyword: string;
  description: string;
  children: Map<string, CommandNode>;
  params: ParamSpec[];
  action?: CommandAction;
}

export interface MatchResult {
  status: 'ok' | 'empty' | 'ambiguous' | 'incomplete' | 'invalid';
  node?: CommandNode;
  args: string[];
  error?: string;
  /** Position of the offending token in the raw input */
  errorPos?: number;
  matchedKeywords: string[];
}

export class CommandTrie {
  private root: CommandNode;

  constructor() {
    this.root = this.createNode('', 'Root');
  }

  private createNode(keyword: string, description: string): CommandNode {
    return { keyword, description, children: new Map(), params: [] };
  }

  // ─── Tree Construction ──────────────────────────────────────────

  /**
   * Register a command path (space-separated keywords).
   *
   *   trie.register('del', 'Remove a route', handler, [{ name: 'network', description: 'a.b.c.d/n' }]);
   */
  register(path: string, description: string, action: CommandAction, params: ParamSpec[] = []): void {
    const keywords = path.split(/\s+/);
    let node = this.root;

    for (let i = 0; i < keywords.length; i++) {
      const kw = keywords[i].toLowerCase();
      let child = node.children.get(kw);
      if (!child) {
        child = this.createNode(kw, kw);
        node.children.set(kw, child);
      }
      node = child;
    }

    node.description = description;
    node.action = action;
    node.params = params;
  }

  // ─── Command Matching ───────────────────────────────────────────

  match(input: string): MatchResult {
    const tokens = input.trim().split(/\s+/).filter(t => t.length > 0);
    if (tokens.length === 0) {
      return { status: 'empty', args: [], matchedKeywords: [] };
    }

    let node = this.root;
    const args: string[] = [];
    const matchedKeywords: string[] = [];

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];

      // Once arguments start, everything after is an argument
      if (args.length === 0) {
        const tokenLower = token.toLowerCase();
        const exactChild = node.children.get(tokenLower);
        const matches = exactChild ? [exactChild] : this.prefixMatch(node, tokenLower);

        if (matches.length === 1) {
          node = matches[0];
          matchedKeywords.push(node.keyword);
          continue;
        }

        if (matches.length > 1) {
          const matchNames = matches.map(m => m.keyword).join(', ');
          return {
            status: 'ambiguous',
            args,
            matchedKeywords,
            error: `% Ambiguous command: "${token}" (matches: ${matchNames})`,
          };
        }
      }

      if (node.action && node.params.length > 0) {
        args.push(token);
        continue;
      }

      const pos = this.tokenPosition(input, tokens, i);
      return {
        status: 'invalid',
        args,
        matchedKeywords,
        error: this.formatInvalidInput(input, pos),
        errorPos: pos,
      };
    }

    if (node.action) {
      return { status: 'ok', node, args, matchedKeywords };
    }

    return { status: 'incomplete', node, args, matchedKeywords, error: '% Incomplete command.' };
  }

  // ─── Help & Completion ──────────────────────────────────────────

  /** Executable commands in registration order, with their usage */
  listCommands(): Array<{ usage: string; description: string }> {
    const results: Array<{ usage: string; description: string }> = [];
    const walk = (node: CommandNode, path: string[]): void => {
      for (const [, child] of node.children) {
        const childPath = [...path, child.keyword];
        if (child.action) {
          results.push({ usage: CommandTrie.usage(childPath.join(' '), child), description: child.description });
        }
        walk(child, childPath);
      }
    };
    walk(this.root, []);
    return results;
  }

  static usage(command: string, node: CommandNode): string {
    const params = node.params.map(p => (p.optional ? `[${p.name}]` : `<${p.name}>`));
    return [command, ...params].join(' ');
  }

  /**
   * Complete the keyword being typed.
   *
   *   "sh<Tab>" → "show " (unique prefix)
   *   "s<Tab>"  → null (ambiguous: send, show, stats)
   */
  tabComplete(input: string): string | null {
    const tokens = input.trim().split(/\s+/).filter(t => t.length > 0);
    if (tokens.length === 0) return null;

    let node = this.root;
    const completed: string[] = [];

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i].toLowerCase();
      const isLast = i === tokens.length - 1;
      const exact = node.children.get(token);
      const matches = exact ? [exact] : this.prefixMatch(node, token);

      if (matches.length !== 1) return null;

      completed.push(matches[0].keyword);
      if (isLast && !input.endsWith(' ')) {
        return completed.join(' ') + ' ';
      }
      node = matches[0];
    }

    return null;
  }

  // ─── Internal Helpers ───────────────────────────────────────────

  private prefixMatch(node: CommandNode, prefix: string): CommandNode[] {
    const results: CommandNode[] = [];
    for (const [keyword, child] of node.children) {
      if (keyword.startsWith(prefix)) {
        results.push(child);
      }
    }
    return results;
  }

  private tokenPosition(input: string, tokens: string[], index: number): number {
    let pos = 0;
    for (let i = 0; i <= index; i++) {
      pos = input.indexOf(tokens[i], i === 0 ? 0 : pos + tokens[i - 1].length);
    }
    return pos;
  }

  private formatInvalidInput(input: string, errorPos: number): string {
    const marker = ' '.repeat(errorPos) + '^';
    return `% Invalid input detected at '^' marker.\n${input}\n${marker}`;
  }
}
