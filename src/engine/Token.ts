export type Token =
    | { type: "KEYWORD"; value: string; pos: number }
    | { type: "IDENTIFIER"; value: string; pos: number }
    | { type: "NUMBER"; value: bigint; pos: number }
    | { type: "STRING"; value: string; pos: number }
    | { type: "SYMBOL"; value: string; pos: number };

export type TokenType = Token["type"];

// Raw text of a token, for diagnostics.
export function tokenText(token: Token): string {
    switch (token.type) {
        case "NUMBER": return token.value.toString();
        case "STRING": return `'${token.value}'`;
        default: return token.value;
    }
}
