/**
 * Path Rewriter
 *
 * Ordered literal find/replace over import paths. Scanning left to right,
 * the earliest match wins; at the same position the rule listed first wins.
 */

import { PAIR_SEPARATOR, RULE_SEPARATOR } from '../../utils/constants.js';
import { RewriteConfigError } from '../../utils/errors.js';

export interface RewriteRule {
  readonly from: string;
  readonly to: string;
}

export class PathRewriter {
  /** Rewriter that returns every input unchanged */
  static readonly identity = new PathRewriter([]);

  readonly rules: readonly RewriteRule[];

  constructor(rules: readonly RewriteRule[]) {
    for (const rule of rules) {
      if (rule.from === '') {
        throw new RewriteConfigError(`rewrite rule "=${rule.to}" has an empty path to replace`);
      }
    }
    this.rules = Object.freeze([...rules]);
  }

  /**
   * Parses `old1=new1,old2=new2`. An empty string yields no rules.
   */
  static parse(config: string): PathRewriter {
    if (config === '') {
      return PathRewriter.identity;
    }

    const rules = config.split(RULE_SEPARATOR).map((pair): RewriteRule => {
      const parts = pair.split(PAIR_SEPARATOR);
      if (parts.length !== 2) {
        throw new RewriteConfigError(
          `invalid rewrite rule "${pair}": expected canonical${PAIR_SEPARATOR}actual`
        );
      }
      const [from, to] = parts;
      return { from, to };
    });

    return new PathRewriter(rules);
  }

  rewrite(input: string): string {
    if (this.rules.length === 0) {
      return input;
    }

    let output = '';
    let i = 0;

    while (i < input.length) {
      const rule = this.rules.find((r) => input.startsWith(r.from, i));
      if (rule) {
        output += rule.to;
        i += rule.from.length;
      } else {
        output += input[i];
        i++;
      }
    }

    return output;
  }
}
