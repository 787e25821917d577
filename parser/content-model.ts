/**
 * Content Model
 *
 * Which node kinds a container may hold. Two classifications are kept apart:
 * what a node *is* (its category) and what it *accepts* (its content model).
 */

import { Node, NodeKind, getChildren } from './ast-types.js';
import {
  DiagnosticCategory,
  DiagnosticCode,
  DiagnosticSeverity,
  StreamDiagnostic
} from './parser-interfaces.js';

/**
 * What a node is, as seen by a prospective parent
 */
export enum NodeCategory {
  Block = 'block',
  Inline = 'inline',
  /** List items, table rows/cells, description parts: legal only in their own container */
  Part = 'part',
  /** Foreign content such as a nested document; only ever passed through */
  Opaque = 'opaque',
}

/**
 * What a node accepts as children
 */
export enum ContentModel {
  Root = 'root',
  Block = 'block',
  Inline = 'inline',
  ListContainer = 'list-container',
  ItemContainer = 'item-container',
  TableContainer = 'table-container',
  RowContainer = 'row-container',
  CellContainer = 'cell-container',
  DescriptionListContainer = 'description-list-container',
  DescriptionItemContainer = 'description-item-container',
  Leaf = 'leaf',
}

export function nodeCategory(kind: NodeKind): NodeCategory {
  switch (kind) {
    case NodeKind.Document:
      return NodeCategory.Opaque;

    case NodeKind.FrontMatter:
    case NodeKind.Paragraph:
    case NodeKind.Heading:
    case NodeKind.BlockQuote:
    case NodeKind.List:
    case NodeKind.CodeBlock:
    case NodeKind.HtmlBlock:
    case NodeKind.ThematicBreak:
    case NodeKind.Table:
    case NodeKind.DescriptionList:
    case NodeKind.FootnoteDefinition:
    case NodeKind.MathBlock:
      return NodeCategory.Block;

    case NodeKind.ListItem:
    case NodeKind.TaskItem:
    case NodeKind.TableRow:
    case NodeKind.TableCell:
    case NodeKind.DescriptionItem:
    case NodeKind.DescriptionTerm:
    case NodeKind.DescriptionDetails:
      return NodeCategory.Part;

    case NodeKind.Text:
    case NodeKind.Code:
    case NodeKind.Emph:
    case NodeKind.Strong:
    case NodeKind.Strikethrough:
    case NodeKind.Link:
    case NodeKind.Image:
    case NodeKind.HtmlInline:
    case NodeKind.SoftBreak:
    case NodeKind.LineBreak:
    case NodeKind.Math:
    case NodeKind.FootnoteReference:
    case NodeKind.Raw:
      return NodeCategory.Inline;
  }
}

export function contentModel(kind: NodeKind): ContentModel {
  switch (kind) {
    case NodeKind.Document:
      return ContentModel.Root;

    case NodeKind.BlockQuote:
    case NodeKind.FootnoteDefinition:
    case NodeKind.DescriptionTerm:
    case NodeKind.DescriptionDetails:
      return ContentModel.Block;

    case NodeKind.ListItem:
    case NodeKind.TaskItem:
      return ContentModel.ItemContainer;

    case NodeKind.Paragraph:
    case NodeKind.Heading:
    case NodeKind.Emph:
    case NodeKind.Strong:
    case NodeKind.Strikethrough:
    case NodeKind.Link:
    case NodeKind.Image:
      return ContentModel.Inline;

    case NodeKind.List:
      return ContentModel.ListContainer;
    case NodeKind.Table:
      return ContentModel.TableContainer;
    case NodeKind.TableRow:
      return ContentModel.RowContainer;
    case NodeKind.TableCell:
      return ContentModel.CellContainer;
    case NodeKind.DescriptionList:
      return ContentModel.DescriptionListContainer;
    case NodeKind.DescriptionItem:
      return ContentModel.DescriptionItemContainer;

    case NodeKind.FrontMatter:
    case NodeKind.CodeBlock:
    case NodeKind.HtmlBlock:
    case NodeKind.ThematicBreak:
    case NodeKind.MathBlock:
    case NodeKind.Text:
    case NodeKind.Code:
    case NodeKind.HtmlInline:
    case NodeKind.SoftBreak:
    case NodeKind.LineBreak:
    case NodeKind.Math:
    case NodeKind.FootnoteReference:
    case NodeKind.Raw:
      return ContentModel.Leaf;
  }
}

/**
 * True when `parentKind` may hold `childKind` under the strict rules.
 * The document root's last-resort acceptance of anything is not included here.
 */
export function accepts(parentKind: NodeKind, childKind: NodeKind): boolean {
  const category = nodeCategory(childKind);
  switch (contentModel(parentKind)) {
    case ContentModel.Root:
    case ContentModel.Block:
    case ContentModel.ItemContainer:
      return category === NodeCategory.Block;
    case ContentModel.Inline:
    case ContentModel.CellContainer:
      return category === NodeCategory.Inline;
    case ContentModel.ListContainer:
      return childKind === NodeKind.ListItem || childKind === NodeKind.TaskItem;
    case ContentModel.TableContainer:
      return childKind === NodeKind.TableRow;
    case ContentModel.RowContainer:
      return childKind === NodeKind.TableCell;
    case ContentModel.DescriptionListContainer:
      return childKind === NodeKind.DescriptionItem;
    case ContentModel.DescriptionItemContainer:
      return childKind === NodeKind.DescriptionTerm || childKind === NodeKind.DescriptionDetails;
    case ContentModel.Leaf:
      return false;
  }
}

/**
 * A parent/child pair breaking the content model
 */
export interface ContentModelViolation {
  parent: Node;
  child: Node;
  /** Child indices from the checked root down to the offending child */
  path: number[];
}

/**
 * Lists every parent/child pair below `root` that breaks the content model.
 * Direct children of a document root are exempt.
 */
export function findContentModelViolations(root: Node): ContentModelViolation[] {
  const violations: ContentModelViolation[] = [];
  visit(root, [], root.kind === NodeKind.Document);
  return violations;

  function visit(parent: Node, path: number[], permissive: boolean): void {
    getChildren(parent).forEach((child, index) => {
      const childPath = [...path, index];
      if (!permissive && !accepts(parent.kind, child.kind)) {
        violations.push({ parent, child, path: childPath });
      }
      // nested documents are opaque: their insides are not checked
      if (child.kind !== NodeKind.Document) {
        visit(child, childPath, false);
      }
    });
  }
}

/**
 * Content model violations below `root` as diagnostics
 */
export function validateContentModel(root: Node): StreamDiagnostic[] {
  return findContentModelViolations(root).map(({ parent, child, path }) => ({
    severity: DiagnosticSeverity.Warning,
    category: DiagnosticCategory.Structure,
    code: DiagnosticCode.CONTENT_MODEL_VIOLATION,
    message: `${NodeKind[parent.kind]} does not accept ${NodeKind[child.kind]}`,
    context: { parent: NodeKind[parent.kind], child: NodeKind[child.kind], path }
  }));
}
