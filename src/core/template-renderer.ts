/**
 * Template rendering using Handlebars.
 *
 * Templates are parsed once into an AST, which serves both rendering (against
 * the binding set) and static discovery of the variables a template reads.
 */

import Handlebars from 'handlebars';

import { DotlinkError, ErrorCode } from './errors.js';

import type { Env } from './environment.js';

// Private instance so helper registration stays local to this module
const engine = Handlebars.create();

// `{{#if (eq os "linux")}}`
engine.registerHelper('eq', function (a: unknown, b: unknown): boolean {
  return a === b;
});

// Blocks whose body runs against a different context than the bindings
const CONTEXT_SWITCHING_BLOCKS = new Set(['each', 'with']);

function isHelperName(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(engine.helpers, name);
}

function isScoped(node: hbs.AST.PathExpression): boolean {
  return /^(\.|this\b)/.test(node.original);
}

/**
 * Collects the root name of every binding a template looks up. Helper names,
 * `@data` variables and `this`-relative paths are not bindings and are left
 * out. Inside `each`/`with` bodies only lookups climbing back out to the
 * bindings (`../name`, `../../name` two levels down) count.
 */
class VariableCollector extends Handlebars.Visitor {
  readonly names = new Set<string>();
  // Number of enclosing context-switching blocks
  private scopeDepth = 0;

  PathExpression(node: hbs.AST.PathExpression): void {
    if (node.data || node.depth !== this.scopeDepth || isScoped(node)) return;
    const [head] = node.parts;
    if (head) this.names.add(head);
  }

  MustacheStatement(node: hbs.AST.MustacheStatement): void {
    this.visitCall(node.path, node.params, node.hash);
  }

  SubExpression(node: hbs.AST.SubExpression): void {
    this.visitCall(node.path, node.params, node.hash);
  }

  BlockStatement(node: hbs.AST.BlockStatement): void {
    this.visitCall(node.path, node.params, node.hash);
    const helper = node.path.parts.length === 1 ? node.path.parts[0] : undefined;
    if (node.program) {
      const switches = helper !== undefined && CONTEXT_SWITCHING_BLOCKS.has(helper);
      if (switches) this.scopeDepth += 1;
      this.accept(node.program);
      if (switches) this.scopeDepth -= 1;
    }
    if (node.inverse) this.accept(node.inverse);
  }

  PartialStatement(node: hbs.AST.PartialStatement): void {
    this.acceptArray(node.params);
    if (node.hash) this.accept(node.hash);
  }

  private visitCall(
    callee: hbs.AST.PathExpression | hbs.AST.Literal,
    params: hbs.AST.Expression[],
    hash: hbs.AST.Hash | undefined,
  ): void {
    const hasArgs = params.length > 0 || (hash !== undefined && hash.pairs.length > 0);
    const knownHelper =
      'parts' in callee && callee.parts.length === 1 && isHelperName(callee.parts[0]);
    // With arguments the callee is always a helper; bare, it is a lookup
    if (!hasArgs && !knownHelper) this.accept(callee);
    this.acceptArray(params);
    if (hash) this.accept(hash);
  }
}

export type TemplateContext = Record<string, string | boolean>;

export function toTemplateContext(env: Env): TemplateContext {
  return Object.fromEntries(env);
}

export interface Template {
  /**
   * Render against the binding set. A lookup of an unbound name fails with
   * TEMPLATE_RENDER_ERROR.
   */
  render(env: Env): Buffer;
  /** Root names of every binding the template reads, sorted. */
  listVariables(): string[];
}

class CompiledTemplate implements Template {
  private delegate: Handlebars.TemplateDelegate<TemplateContext> | undefined;

  constructor(private readonly ast: hbs.AST.Program) {}

  render(env: Env): Buffer {
    try {
      this.delegate ??= engine.compile<TemplateContext>(this.ast, {
        strict: true,
        noEscape: true,
      });
      return Buffer.from(this.delegate(toTemplateContext(env)), 'utf8');
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new DotlinkError(ErrorCode.TEMPLATE_RENDER_ERROR, message);
    }
  }

  listVariables(): string[] {
    const collector = new VariableCollector();
    collector.accept(this.ast);
    return [...collector.names].sort();
  }
}

export function parseTemplate(source: string): Template {
  let ast: hbs.AST.Program;
  try {
    ast = engine.parse(source);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new DotlinkError(ErrorCode.TEMPLATE_PARSE_ERROR, message);
  }
  return new CompiledTemplate(ast);
}
