// Document tree produced by the token parser and consumed by both renderers.
// Every node kind is a member of a closed union; traversals switch on `type`.

export type HeadingLevel = 1 | 2 | 3 | 4 | 5 | 6;

export type ColumnAlignment = 'left' | 'center' | 'right' | null;

export type AlertKind = 'note' | 'tip' | 'important' | 'warning' | 'caution';

export type TextNode = {
    type: 'text';
    literal: string;
};

export type CodeNode = {
    type: 'code';
    literal: string;
};

export type MathNode = {
    type: 'math';
    literal: string;
    display: boolean;
};

export type HtmlInlineNode = {
    type: 'html_inline';
    literal: string;
};

export type LineBreakNode = { type: 'line_break' };

export type SoftBreakNode = { type: 'soft_break' };

export type ImageNode = {
    type: 'image';
    src: string;
    alt: string;
    title: string;
};

export type LinkNode = {
    type: 'link';
    href: string;
    title: string;
    children: InlineNode[];
};

export type FormattingNode = {
    type: 'emphasis' | 'strong' | 'strikethrough' | 'highlight' | 'underline';
    children: InlineNode[];
};

export type InlineNode =
    | TextNode
    | CodeNode
    | MathNode
    | HtmlInlineNode
    | LineBreakNode
    | SoftBreakNode
    | ImageNode
    | LinkNode
    | FormattingNode;

export type ParagraphNode = {
    type: 'paragraph';
    children: InlineNode[];
};

export type HeadingNode = {
    type: 'heading';
    level: HeadingLevel;
    children: InlineNode[];
};

export type ListItemNode = {
    type: 'list_item';
    children: BlockNode[];
};

export type TaskListItemNode = {
    type: 'task_list_item';
    checked: boolean;
    children: BlockNode[];
};

export type ListNode = {
    type: 'list';
    ordered: boolean;
    start: number;
    /** Bullet character for unordered lists, `.` or `)` for ordered ones. */
    delimiter: string;
    tight: boolean;
    children: Array<ListItemNode | TaskListItemNode>;
};

export type CodeBlockNode = {
    type: 'code_block';
    info: string;
    literal: string;
    fenced: boolean;
};

export type BlockQuoteNode = {
    type: 'blockquote';
    children: BlockNode[];
};

export type AlertNode = {
    type: 'alert';
    kind: AlertKind;
    children: BlockNode[];
};

export type TableCellNode = {
    type: 'table_cell';
    children: InlineNode[];
};

export type TableRowNode = {
    type: 'table_row';
    header: boolean;
    children: TableCellNode[];
};

export type TableNode = {
    type: 'table';
    alignments: ColumnAlignment[];
    children: TableRowNode[];
};

export type ThematicBreakNode = { type: 'thematic_break' };

export type HtmlBlockNode = {
    type: 'html_block';
    literal: string;
};

export type BlockNode =
    | ParagraphNode
    | HeadingNode
    | ListNode
    | CodeBlockNode
    | BlockQuoteNode
    | AlertNode
    | TableNode
    | ThematicBreakNode
    | HtmlBlockNode;

export type DocumentNode = {
    type: 'document';
    children: BlockNode[];
};

// Structural view of a markdown-it token. Real `Token` instances satisfy it,
// and tests can build token streams by hand.
export type MarkdownItToken = {
    type: string;
    tag?: string;
    attrs?: Array<[string, string]> | null;
    content?: string;
    info?: string;
    markup?: string;
    nesting?: number;
    level?: number;
    block?: boolean;
    hidden?: boolean;
    map?: [number, number] | null;
    meta?: Record<string, unknown> | null;
    children?: MarkdownItToken[] | null;
};
