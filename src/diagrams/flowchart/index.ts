import { parseWithChevrotain, type ParseOutcome } from "../../core/pipeline.js";
import { GraphBuilder } from "./builder.js";
import { tokenize } from "./lexer.js";
import { parse } from "./parser.js";

export function parseFlowchart(text: string): ParseOutcome {
    const builder = new GraphBuilder();
    return parseWithChevrotain(text, {
        tokenize,
        parse,
        build: (cst, source) => builder.build(cst, source)
    });
}
