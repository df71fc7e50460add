import { Logger } from "@nestjs/common";
import { SourceItem } from "@core";
import { RedditApi, Thing, commentDataSchema, listingSchema, moreDataSchema } from "./reddit.types";

// /api/morechildren takes at most 100 ids per call
const MORE_CHUNK = 100;

export type CommentNode =
  | { kind: "comment"; name: string; body: string; createdAt: Date; replies: CommentNode[] }
  | { kind: "more"; parentId: string; children: string[] };

/** Converts a nested comment listing (as returned by /comments/{id}) into nodes. */
export function toNodes(things: Thing[]): CommentNode[] {
  const out: CommentNode[] = [];
  for (const t of things) {
    const node = toNode(t);
    if (!node) continue;
    if (node.kind === "comment") {
      const replies = listingSchema.safeParse(commentDataSchema.parse(t.data).replies);
      node.replies = replies.success ? toNodes(replies.data.data.children) : [];
    }
    out.push(node);
  }
  return out;
}

/**
 * /api/morechildren answers with a flat list; each thing points at its parent.
 * Rebuild the nesting and return the roots (things whose parent is not in the batch).
 */
export function nestFlat(things: Thing[]): CommentNode[] {
  const nodes: Array<{ node: CommentNode; parent: string }> = [];
  const byName = new Map<string, CommentNode>();

  for (const t of things) {
    const node = toNode(t);
    if (!node) continue;
    const parent = node.kind === "comment" ? parentOf(t) : node.parentId;
    nodes.push({ node, parent });
    if (node.kind === "comment") byName.set(node.name, node);
  }

  const roots: CommentNode[] = [];
  for (const { node, parent } of nodes) {
    const p = byName.get(parent);
    if (p && p.kind === "comment") p.replies.push(node);
    else roots.push(node);
  }
  return roots;
}

function toNode(t: Thing): CommentNode | null {
  if (t.kind === "t1") {
    const c = commentDataSchema.safeParse(t.data);
    if (!c.success) return null;
    return {
      kind: "comment",
      name: c.data.name ?? `t1_${c.data.id}`,
      body: c.data.body,
      createdAt: new Date(c.data.created_utc * 1000),
      replies: [],
    };
  }
  if (t.kind === "more") {
    const m = moreDataSchema.safeParse(t.data);
    if (!m.success) return null;
    return { kind: "more", parentId: m.data.parent_id, children: m.data.children };
  }
  return null;
}

function parentOf(t: Thing) {
  const c = commentDataSchema.safeParse(t.data);
  return c.success ? c.data.parent_id ?? "" : "";
}

function chunks<T>(xs: T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < xs.length; i += size) out.push(xs.slice(i, i + size));
  return out;
}

/**
 * Walks a comment tree depth-first. With `expand` every "load more" placeholder
 * is replaced on demand, so expansion only costs what the consumer pulls;
 * without it only top-level comments are read and placeholders are dropped.
 */
export class ThreadWalker {
  private readonly logger = new Logger(ThreadWalker.name);
  private expansions = 0;

  constructor(
    private readonly api: RedditApi,
    private readonly postId: string,
    private readonly sort: string | null,
    private readonly expand: boolean,
    private readonly signal?: AbortSignal,
  ) {}

  get expanded() {
    return this.expansions;
  }

  async *walk(nodes: CommentNode[]): AsyncGenerator<SourceItem> {
    for (const n of nodes) {
      if (n.kind === "comment") {
        yield { text: n.body, createdAt: n.createdAt };
        if (this.expand) yield* this.walk(n.replies);
        continue;
      }
      if (!this.expand) continue;

      if (n.children.length === 0) {
        // "continue this thread": reload the parent comment's subtree
        yield* this.walk(await this.loadThread(n.parentId));
        continue;
      }
      for (const chunk of chunks(n.children, MORE_CHUNK)) {
        yield* this.walk(await this.loadMore(chunk));
      }
    }
  }

  private async loadMore(ids: string[]): Promise<CommentNode[]> {
    this.expansions++;
    const things = await this.api.moreChildren(`t3_${this.postId}`, ids, this.sort, this.signal);
    this.logger.debug(`Expanded ${ids.length} ids -> ${things.length} things`);
    return nestFlat(things);
  }

  private async loadThread(parentName: string): Promise<CommentNode[]> {
    this.expansions++;
    const commentId = parentName.replace(/^t1_/, "");
    const [, tree] = await this.api.comments(this.postId, { sort: this.sort, comment: commentId }, this.signal);
    const root = toNodes(tree.data.children).find(n => n.kind === "comment");
    // the parent itself was already yielded; only its replies are new
    return root && root.kind === "comment" ? root.replies : [];
  }
}
