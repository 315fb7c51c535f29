import type { CreateTableStmt, InsertStmt, SelectStmt, Statement } from "./AST";
import { ParseError, ValidationError } from "./Errors";
import { lex } from "./Lexer";
import { column, type Column } from "./Schema";
import { tokenText, type Token } from "./Token";
import { ColumnName, TableName, Value, isDataType } from "./Types";

export class Parser {
    private pos = 0;

    constructor(private tokens: readonly Token[]) { }

    static fromSql(sql: string): Parser {
        return new Parser(lex(sql));
    }

    private peek(): Token | undefined {
        return this.tokens[this.pos];
    }

    private next(): Token | undefined {
        const token = this.tokens[this.pos];
        if (token) this.pos++;
        return token;
    }

    private isSymbol(token: Token | undefined, symbol: string): boolean {
        return token?.type === 'SYMBOL' && token.value === symbol;
    }

    private expectKeyword(keyword: string, message: string): void {
        const token = this.next();
        if (token?.type !== 'KEYWORD' || token.value !== keyword) throw new ParseError(message);
    }

    private expectSymbol(symbol: string, message: string): void {
        if (!this.isSymbol(this.next(), symbol)) throw new ParseError(message);
    }

    private expectIdentifier(message: string): string {
        const token = this.next();
        if (token?.type !== 'IDENTIFIER') throw new ParseError(message);
        return token.value;
    }

    // INTO and FROM are not reserved; they arrive as identifiers.
    private expectWord(word: string, message: string): void {
        const token = this.next();
        if (token?.type !== 'IDENTIFIER' || token.value.toUpperCase() !== word) throw new ParseError(message);
    }

    parse(): Statement {
        const first = this.peek();
        if (!first) throw new ParseError("Empty token stream");
        if (first.type !== 'KEYWORD') throw new ParseError("Expected a keyword at the beginning");

        let stmt: Statement;
        switch (first.value) {
            case 'CREATE': stmt = this.parseCreate(); break;
            case 'INSERT': stmt = this.parseInsert(); break;
            case 'SELECT': stmt = this.parseSelect(); break;
            default: throw new ParseError(`Unexpected keyword '${first.value}'`);
        }

        if (this.isSymbol(this.peek(), ';')) this.next();
        const extra = this.peek();
        if (extra) throw new ParseError(`Unexpected token '${tokenText(extra)}' at position ${extra.pos}`);
        return stmt;
    }

    private parseCreate(): CreateTableStmt {
        this.expectKeyword('CREATE', "Expected CREATE");
        this.expectKeyword('TABLE', "Expected TABLE after CREATE");
        const name = toTableName(this.expectIdentifier("Expected table name after TABLE"));
        this.expectSymbol('(', "Expected '(' after table name");

        const columns: Column[] = [];
        for (;;) {
            const colName = toColumnName(this.expectIdentifier("Expected column name"));
            const typeWord = this.expectIdentifier("Expected column type");
            if (!isDataType(typeWord)) throw new ParseError(`Unknown type '${typeWord}'`);
            columns.push(column(colName, typeWord));

            const sep = this.next();
            if (this.isSymbol(sep, ',')) continue;
            if (this.isSymbol(sep, ')')) break;
            throw new ParseError("Expected ',' or ')' after column definition");
        }
        return { type: 'CREATE_TABLE', name, columns };
    }

    private parseInsert(): InsertStmt {
        this.expectKeyword('INSERT', "Expected INSERT");
        this.expectWord('INTO', "Expected INTO after INSERT");
        const table = toTableName(this.expectIdentifier("Expected table name after INTO"));
        this.expectKeyword('VALUES', "Expected VALUES after table name");
        this.expectSymbol('(', "Expected '(' after VALUES");

        const values: Value[] = [];
        for (;;) {
            values.push(this.parseLiteral());

            const sep = this.next();
            if (this.isSymbol(sep, ',')) continue;
            if (this.isSymbol(sep, ')')) break;
            throw new ParseError("Expected ',' or ')' after value");
        }
        return { type: 'INSERT', table, values };
    }

    private parseSelect(): SelectStmt {
        this.expectKeyword('SELECT', "Expected SELECT");

        let columns: ColumnName[] | undefined;
        if (this.isSymbol(this.peek(), '*')) {
            this.next();
        } else {
            columns = [];
            do {
                columns.push(toColumnName(this.expectIdentifier("Expected column name or '*' after SELECT")));
            } while (this.isSymbol(this.peek(), ',') && this.next());
        }

        this.expectWord('FROM', "Expected FROM after column list");
        const table = toTableName(this.expectIdentifier("Expected table name after FROM"));
        return { type: 'SELECT', table, columns };
    }

    private parseLiteral(): Value {
        const token = this.next();
        if (token?.type === 'NUMBER') return Value.int(token.value);
        if (token?.type === 'STRING') return Value.text(token.value);
        throw new ParseError("Expected a literal value");
    }
}

export function parse(tokens: readonly Token[]): Statement {
    return new Parser(tokens).parse();
}

function toTableName(value: string): TableName {
    try {
        return TableName.create(value);
    } catch (e) {
        if (e instanceof ValidationError) throw new ParseError(e.message);
        throw e;
    }
}

function toColumnName(value: string): ColumnName {
    try {
        return ColumnName.create(value);
    } catch (e) {
        if (e instanceof ValidationError) throw new ParseError(e.message);
        throw e;
    }
}
