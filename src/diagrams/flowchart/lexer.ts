import { createToken, Lexer } from "chevrotain";

// Categories. Anything tagged LabelPart may appear inside a node label, an
// edge label or a subgraph title; the builder reads the source text back.
export const LabelPart = createToken({ name: "LabelPart", pattern: Lexer.NA });
export const LinkToken = createToken({ name: "LinkToken", pattern: Lexer.NA });

// Node ids may contain inner hyphens (my-node) but never end with one, so A-->B splits
export const Identifier = createToken({
    name: "Identifier",
    pattern: /[A-Za-z0-9_]+(?:-[A-Za-z0-9_]+)*/,
    categories: [LabelPart]
});

// Keywords
export const FlowchartKeyword = createToken({
    name: "FlowchartKeyword",
    pattern: /flowchart/,
    longer_alt: Identifier,
    categories: [LabelPart]
});

export const GraphKeyword = createToken({
    name: "GraphKeyword",
    pattern: /graph/,
    longer_alt: Identifier,
    categories: [LabelPart]
});

export const SubgraphKeyword = createToken({
    name: "SubgraphKeyword",
    pattern: /subgraph/,
    longer_alt: Identifier,
    categories: [LabelPart]
});

export const EndKeyword = createToken({
    name: "EndKeyword",
    pattern: /end/,
    longer_alt: Identifier,
    categories: [LabelPart]
});

export const DirectionKeyword = createToken({
    name: "DirectionKeyword",
    pattern: /direction/,
    longer_alt: Identifier,
    categories: [LabelPart]
});

export const DirectionValue = createToken({
    name: "DirectionValue",
    pattern: /TD|TB|BT|RL|LR/,
    longer_alt: Identifier,
    categories: [LabelPart]
});

const STYLE_LINE = /(?:classDef|class|style|linkStyle|click)[ \t][^\n\r;]*/y;

// Only at the start of a statement, so "style" inside a label stays text
function matchStyleLine(text: string, offset: number): RegExpExecArray | null {
    let i = offset - 1;
    while (i >= 0 && (text[i] === " " || text[i] === "\t")) i--;
    if (i >= 0 && text[i] !== "\n" && text[i] !== "\r" && text[i] !== ";") return null;
    STYLE_LINE.lastIndex = offset;
    return STYLE_LINE.exec(text);
}

// Styling and interaction lines are taken whole; the builder reads node fills from them
export const StyleLine = createToken({
    name: "StyleLine",
    pattern: { exec: matchStyleLine },
    line_breaks: false,
    start_chars_hint: ["c", "s", "l"]
});

// Links - order matters, most specific first
export const BiArrow = createToken({ name: "BiArrow", pattern: /<-{2,}>/, categories: [LinkToken] });
export const BiThickArrow = createToken({ name: "BiThickArrow", pattern: /<={2,}>/, categories: [LinkToken] });
export const BiDottedArrow = createToken({ name: "BiDottedArrow", pattern: /<-\.+->/, categories: [LinkToken] });
export const DottedArrow = createToken({ name: "DottedArrow", pattern: /-\.+->/, categories: [LinkToken] });
export const DottedLine = createToken({ name: "DottedLine", pattern: /-\.+-/, categories: [LinkToken] });
export const ThickArrow = createToken({ name: "ThickArrow", pattern: /={2,}>/, categories: [LinkToken] });
export const ThickLine = createToken({ name: "ThickLine", pattern: /={3,}/, categories: [LinkToken] });
export const Arrow = createToken({ name: "Arrow", pattern: /-{2,}>/, categories: [LinkToken] });
export const CircleEnd = createToken({ name: "CircleEnd", pattern: /-{2,}o(?![A-Za-z0-9_])/, categories: [LinkToken] });
export const CrossEnd = createToken({ name: "CrossEnd", pattern: /-{2,}x(?![A-Za-z0-9_])/, categories: [LinkToken] });
export const Line = createToken({ name: "Line", pattern: /-{3,}/, categories: [LinkToken] });
export const Invisible = createToken({ name: "Invisible", pattern: /~{3,}/, categories: [LinkToken] });

// Openers of the "-- text -->" and "== text ==>" forms
export const TwoDashes = createToken({ name: "TwoDashes", pattern: /--/ });
export const TwoEquals = createToken({ name: "TwoEquals", pattern: /==/ });

// Node shapes - two-character brackets before single ones
export const DoubleSquareOpen = createToken({ name: "DoubleSquareOpen", pattern: /\[\[/ });
export const DoubleSquareClose = createToken({ name: "DoubleSquareClose", pattern: /\]\]/ });
export const DoubleRoundOpen = createToken({ name: "DoubleRoundOpen", pattern: /\(\(/ });
export const DoubleRoundClose = createToken({ name: "DoubleRoundClose", pattern: /\)\)/ });
export const HexagonOpen = createToken({ name: "HexagonOpen", pattern: /\{\{/ });
export const HexagonClose = createToken({ name: "HexagonClose", pattern: /\}\}/ });
export const StadiumOpen = createToken({ name: "StadiumOpen", pattern: /\(\[/ });
export const StadiumClose = createToken({ name: "StadiumClose", pattern: /\]\)/ });
export const CylinderOpen = createToken({ name: "CylinderOpen", pattern: /\[\(/ });
export const CylinderClose = createToken({ name: "CylinderClose", pattern: /\)\]/ });
export const SlashOpen = createToken({ name: "SlashOpen", pattern: /\[\// });
export const BackslashOpen = createToken({ name: "BackslashOpen", pattern: /\[\\/ });
export const SlashClose = createToken({ name: "SlashClose", pattern: /\/\]/ });
export const BackslashClose = createToken({ name: "BackslashClose", pattern: /\\\]/ });

export const SquareOpen = createToken({ name: "SquareOpen", pattern: /\[/ });
export const SquareClose = createToken({ name: "SquareClose", pattern: /\]/ });
export const RoundOpen = createToken({ name: "RoundOpen", pattern: /\(/ });
export const RoundClose = createToken({ name: "RoundClose", pattern: /\)/ });
export const DiamondOpen = createToken({ name: "DiamondOpen", pattern: /\{/ });
export const DiamondClose = createToken({ name: "DiamondClose", pattern: /\}/ });
export const AngleOpen = createToken({ name: "AngleOpen", pattern: />/, categories: [LabelPart] });
export const LessThan = createToken({ name: "LessThan", pattern: /</, categories: [LabelPart] });
export const Slash = createToken({ name: "Slash", pattern: /[\/\\]/, categories: [LabelPart] });

export const Pipe = createToken({ name: "Pipe", pattern: /\|/ });
export const TripleColon = createToken({ name: "TripleColon", pattern: /:::/, categories: [LabelPart] });
export const Ampersand = createToken({ name: "Ampersand", pattern: /&/, categories: [LabelPart] });
export const Comma = createToken({ name: "Comma", pattern: /,/, categories: [LabelPart] });
export const Colon = createToken({ name: "Colon", pattern: /:/, categories: [LabelPart] });
export const Semicolon = createToken({ name: "Semicolon", pattern: /;/, categories: [LabelPart] });

export const QuotedString = createToken({
    name: "QuotedString",
    pattern: /"[^"\n\r]*"/,
    categories: [LabelPart]
});

// Any other run of label characters
export const Text = createToken({
    name: "Text",
    pattern: /[^\s[\](){}|<>&,;:\/\\"]+/,
    categories: [LabelPart]
});

export const Comment = createToken({
    name: "Comment",
    pattern: /%%[^\n\r]*/,
    group: Lexer.SKIPPED
});

export const WhiteSpace = createToken({
    name: "WhiteSpace",
    pattern: /[ \t]+/,
    group: Lexer.SKIPPED
});

export const Newline = createToken({
    name: "Newline",
    pattern: /[\n\r]+/,
    line_breaks: true
});

// Token order is CRUCIAL - most specific first
export const allTokens = [
    Comment,
    WhiteSpace,
    Newline,
    QuotedString,
    StyleLine,

    // Keywords before identifiers
    FlowchartKeyword,
    GraphKeyword,
    SubgraphKeyword,
    EndKeyword,
    DirectionKeyword,
    DirectionValue,

    // Links
    BiArrow,
    BiThickArrow,
    BiDottedArrow,
    DottedArrow,
    DottedLine,
    ThickArrow,
    ThickLine,
    Arrow,
    CircleEnd,
    CrossEnd,
    Line,
    Invisible,
    TwoDashes,
    TwoEquals,

    // Brackets
    DoubleSquareOpen,
    DoubleSquareClose,
    DoubleRoundOpen,
    DoubleRoundClose,
    HexagonOpen,
    HexagonClose,
    StadiumOpen,
    StadiumClose,
    CylinderOpen,
    CylinderClose,
    SlashOpen,
    BackslashOpen,
    SlashClose,
    BackslashClose,
    SquareOpen,
    SquareClose,
    RoundOpen,
    RoundClose,
    DiamondOpen,
    DiamondClose,
    AngleOpen,
    LessThan,
    Slash,

    Pipe,
    TripleColon,
    Ampersand,
    Comma,
    Colon,
    Semicolon,

    Identifier,
    Text,

    // Categories
    LabelPart,
    LinkToken
];

export const FlowchartLexer = new Lexer(allTokens);

export function tokenize(text: string) {
    return FlowchartLexer.tokenize(text);
}
