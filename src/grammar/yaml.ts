/**
 * YAML (and JSON) grammar adapter.
 *
 * Built on the lossless CST of the `yaml` package. The CST keeps every
 * character of the source, so flattening it into the arena only has to decide
 * which tokens become nodes: spaces and newlines become gaps, every other
 * token becomes a leaf, and collections become composites.
 *
 * The walk mirrors the order in which the CST stringifies itself: item start
 * tokens, key, separator tokens, value.
 */

import { type CST, Parser, parseAllDocuments } from "yaml";
import { SyntaxTreeBuilder, type SyntaxTree } from "../tree/index.js";
import { StructuralMergeError } from "../merge/errors.js";
import { mergeErrors } from "../strings/errors.js";
import { ATOMIC, ORDERED, UNORDERED } from "./types.js";
import type { FileCriterion, GrammarAdapter, KindCapabilities } from "./types.js";

/**
 * Keys whose sequence values are treated as sets
 */
export const DEFAULT_UNORDERED_KEYS: readonly string[] = [
  "tags",
  "depends_on",
  "deps",
  "dependencies",
  "requires",
];

export interface YamlGrammarOptions {
  id?: string;
  name?: string;
  criteria?: readonly FileCriterion[];
  /** Keys whose sequence values are unordered */
  unorderedKeys?: readonly string[];
}

const SCALAR_KINDS = {
  alias: "alias",
  scalar: "plain_scalar",
  "single-quoted-scalar": "single_quoted_scalar",
  "double-quoted-scalar": "double_quoted_scalar",
} as const;

const KEY_KINDS = Object.values(SCALAR_KINDS);

/** Tokens that carry no text of their own */
const SILENT_TOKENS = new Set(["doc-mode", "flow-error-end"]);

/** Tokens that become gaps */
const TRIVIA_TOKENS = new Set(["space", "newline"]);

const CAPABILITIES: Record<string, KindCapabilities> = {
  block_map: UNORDERED,
  flow_map: UNORDERED,
  block_set: UNORDERED,
  flow_set: UNORDERED,
  block_map_entry: { ...ORDERED, identity: { childKinds: KEY_KINDS } },
  flow_pair: { ...ORDERED, identity: { childKinds: KEY_KINDS } },
  block_scalar: ATOMIC,
};

/**
 * Item shape shared by block maps, block sequences and flow collections
 */
interface CollectionItem {
  start: CST.SourceToken[];
  key?: CST.Token | null;
  sep?: CST.SourceToken[];
  value?: CST.Token;
}

type FlowScalarToken = Extract<CST.Token, { type: keyof typeof SCALAR_KINDS }>;

type Action =
  | { type: "token"; token: CST.Token; setLike: boolean }
  | { type: "sources"; tokens: readonly CST.Token[] }
  | { type: "item"; item: CollectionItem; kind: string }
  | { type: "flow-item"; item: CollectionItem }
  | { type: "leaf"; kind: string; text: string }
  | { type: "open"; kind: string }
  | { type: "close" };

function isFlowScalar(token: CST.Token | null | undefined): token is FlowScalarToken {
  return token !== null && token !== undefined && Object.hasOwn(SCALAR_KINDS, token.type);
}

/**
 * Plain text of a scalar key, without quotes
 */
function keyText(token: CST.Token | null | undefined): string | undefined {
  if (!isFlowScalar(token) || token.type === "alias") return undefined;
  if (token.type === "scalar") return token.source;
  return token.source.slice(1, -1);
}

/**
 * Zero or one token action, for optional CST slots
 */
function optional(token: CST.Token | null | undefined, setLike = false): Action[] {
  return token ? [{ type: "token", token, setLike }] : [];
}

export class YamlGrammar implements GrammarAdapter {
  readonly id: string;
  readonly name: string;
  readonly criteria: readonly FileCriterion[];
  private readonly unorderedKeys: ReadonlySet<string>;

  constructor(options: YamlGrammarOptions = {}) {
    this.id = options.id ?? "yaml";
    this.name = options.name ?? "YAML";
    this.criteria = options.criteria ?? [
      { type: "extension", extension: "yaml" },
      { type: "extension", extension: "yml" },
    ];
    this.unorderedKeys = new Set(options.unorderedKeys ?? DEFAULT_UNORDERED_KEYS);
  }

  capabilities(kind: string): KindCapabilities {
    return CAPABILITIES[kind] ?? ORDERED;
  }

  parse(text: string): SyntaxTree {
    const documents = parseAllDocuments(text);
    for (const document of documents) {
      const [first] = document.errors;
      if (first) {
        throw new StructuralMergeError(first.message, "PARSE_FAILURE");
      }
    }
    const tokens = Array.from(new Parser().parse(text));
    return new CstFlattener(text, this.unorderedKeys).flatten(tokens);
  }
}

/**
 * Walks the CST with an explicit stack and feeds the tree builder
 */
class CstFlattener {
  private readonly builder: SyntaxTreeBuilder;
  private readonly stack: Action[] = [];
  private offset = 0;

  constructor(
    private readonly source: string,
    private readonly unorderedKeys: ReadonlySet<string>,
  ) {
    this.builder = new SyntaxTreeBuilder(source, "stream");
  }

  flatten(tokens: readonly CST.Token[]): SyntaxTree {
    this.schedule({ type: "sources", tokens });
    for (let action = this.stack.pop(); action !== undefined; action = this.stack.pop()) {
      this.perform(action);
    }
    if (this.offset !== this.source.length) {
      throw new StructuralMergeError(mergeErrors.incompleteTokens(this.offset, this.source.length), "PARSE_FAILURE");
    }
    return this.builder.build();
  }

  /**
   * Queue actions to run in the given order
   */
  private schedule(...actions: Action[]): void {
    for (let i = actions.length - 1; i >= 0; i--) {
      this.stack.push(actions[i]);
    }
  }

  private perform(action: Action): void {
    switch (action.type) {
      case "open":
        this.builder.open(action.kind);
        return;
      case "close":
        this.builder.close();
        return;
      case "sources":
        this.schedule(...action.tokens.map((token): Action => ({ type: "token", token, setLike: false })));
        return;
      case "item":
        this.item(action.item, action.kind);
        return;
      case "flow-item":
        this.flowItem(action.item);
        return;
      case "leaf":
        this.leaf(action.kind, action.text);
        return;
      case "token":
        this.token(action.token, action.setLike);
        return;
    }
  }

  private leaf(kind: string, text: string): void {
    this.builder.leaf(kind, this.offset, text);
    this.offset += text.length;
  }

  private token(token: CST.Token, setLike: boolean): void {
    switch (token.type) {
      case "document":
        this.schedule(
          { type: "open", kind: "document" },
          { type: "sources", tokens: token.start },
          ...optional(token.value),
          { type: "sources", tokens: token.end ?? [] },
          { type: "close" },
        );
        return;

      case "doc-end":
        this.leaf("doc_end", token.source);
        this.schedule({ type: "sources", tokens: token.end ?? [] });
        return;

      case "directive":
        this.leaf("directive", token.source);
        return;

      case "error":
        throw new StructuralMergeError(token.message, "PARSE_FAILURE");

      case "alias":
      case "scalar":
      case "single-quoted-scalar":
      case "double-quoted-scalar":
        this.leaf(SCALAR_KINDS[token.type], token.source);
        this.schedule({ type: "sources", tokens: token.end ?? [] });
        return;

      case "block-scalar":
        this.schedule(
          { type: "open", kind: "block_scalar" },
          { type: "sources", tokens: token.props },
          { type: "leaf", kind: "block_scalar_content", text: token.source },
          { type: "close" },
        );
        return;

      case "block-map":
        this.schedule(
          { type: "open", kind: "block_map" },
          ...token.items.map((item): Action => ({ type: "item", item, kind: "block_map_entry" })),
          { type: "close" },
        );
        return;

      case "block-seq":
        this.schedule(
          { type: "open", kind: setLike ? "block_set" : "block_seq" },
          ...token.items.map((item): Action => ({ type: "item", item, kind: "block_seq_item" })),
          { type: "close" },
        );
        return;

      case "flow-collection": {
        const isMap = token.start.source === "{";
        const kind = isMap ? "flow_map" : setLike ? "flow_set" : "flow_seq";
        this.schedule(
          { type: "open", kind },
          { type: "token", token: token.start, setLike: false },
          ...token.items.map((item): Action => ({ type: "flow-item", item })),
          { type: "sources", tokens: token.end },
          { type: "close" },
        );
        return;
      }

      default:
        if (SILENT_TOKENS.has(token.type)) return;
        if (TRIVIA_TOKENS.has(token.type)) {
          this.offset += token.source.length;
          return;
        }
        this.leaf(token.type.replace(/-/g, "_"), token.source);
    }
  }

  /**
   * One block collection item
   */
  private item(item: CollectionItem, kind: string): void {
    this.schedule(
      { type: "open", kind },
      { type: "sources", tokens: item.start },
      ...this.itemBody(item),
      { type: "close" },
    );
  }

  /**
   * One flow collection item. The comma in front of an item belongs to it, so
   * the separator travels with the element. Key/value pairs become
   * `flow_pair`; bare values become `flow_seq_item`.
   */
  private flowItem(item: CollectionItem): void {
    const start: Action = { type: "sources", tokens: item.start };
    const hasKey = item.key !== undefined && item.key !== null;
    const hasContent =
      hasKey ||
      item.value !== undefined ||
      (item.sep ?? []).length > 0 ||
      item.start.some((token) => !TRIVIA_TOKENS.has(token.type));
    if (!hasContent) {
      this.schedule(start);
      return;
    }
    const isPair = hasKey || (item.sep ?? []).some((token) => token.type === "map-value-ind");
    this.schedule(
      { type: "open", kind: isPair ? "flow_pair" : "flow_seq_item" },
      start,
      ...this.itemBody(item),
      { type: "close" },
    );
  }

  private itemBody(item: CollectionItem): Action[] {
    const setLike = this.unorderedKeys.has(keyText(item.key) ?? "\u0000");
    return [
      ...optional(item.key),
      { type: "sources", tokens: item.sep ?? [] },
      ...optional(item.value, setLike),
    ];
  }
}
