/**
 * Minimal template expansion for engine configs.
 *
 *   {{NAME}}                 replaced by a variable
 *   {{#USERS}} ... {{/USERS}} repeated once per user, joined by a separator;
 *                            inside, per-user variables shadow global ones
 *
 * Anything else that looks like a tag is an error: unknown names, lowercase
 * or malformed tags, nested or unbalanced sections, a stray "{{".
 */

export class TemplateError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "TemplateError";
	}
}

export type TemplateVariables = Readonly<Record<string, string>>;

export type TemplateContext = {
	variables: TemplateVariables;
	users: readonly TemplateVariables[];
	/** Names every entry of `users` provides. */
	userFields: readonly string[];
	separator: string;
	/** Applied to every substituted value (e.g. JSON string escaping). */
	escape?: (value: string) => string;
};

const SECTION = "USERS";
const TAG = /\{\{([^{}]*)\}\}/g;
const TAG_BODY = /^\s*([#/]?)\s*([A-Z][A-Z0-9_]*)\s*$/;

export type TemplateNode =
	| { type: "text"; value: string }
	| { type: "var"; name: string; line: number }
	| { type: "section"; body: TemplateNode[] };

function lineAt(source: string, index: number): number {
	let line = 1;
	for (let i = 0; i < index; i++) {
		if (source.charCodeAt(i) === 10) line++;
	}
	return line;
}

function pushText(nodes: TemplateNode[], source: string, value: string, offset: number): void {
	if (value.length === 0) return;
	const stray = value.indexOf("{{");
	if (stray >= 0) {
		throw new TemplateError(`Unterminated tag at line ${lineAt(source, offset + stray)}`);
	}
	nodes.push({ type: "text", value });
}

export function parseTemplate(source: string): TemplateNode[] {
	const root: TemplateNode[] = [];
	let current = root;
	let sectionLine: number | null = null;
	let cursor = 0;

	for (const match of source.matchAll(TAG)) {
		const index = match.index ?? 0;
		pushText(current, source, source.slice(cursor, index), cursor);
		cursor = index + match[0].length;

		const line = lineAt(source, index);
		const tag = TAG_BODY.exec(match[1]);
		if (!tag) {
			throw new TemplateError(`Malformed tag "${match[0]}" at line ${line}`);
		}
		const [, sigil, name] = tag;

		if (sigil === "") {
			current.push({ type: "var", name, line });
			continue;
		}
		if (name !== SECTION) {
			throw new TemplateError(`Unknown section "${name}" at line ${line}`);
		}
		if (sigil === "#") {
			if (sectionLine !== null) {
				throw new TemplateError(`Nested {{#${SECTION}}} at line ${line}`);
			}
			const body: TemplateNode[] = [];
			root.push({ type: "section", body });
			current = body;
			sectionLine = line;
		} else {
			if (sectionLine === null) {
				throw new TemplateError(`{{/${SECTION}}} without opening tag at line ${line}`);
			}
			current = root;
			sectionLine = null;
		}
	}
	pushText(current, source, source.slice(cursor), cursor);

	if (sectionLine !== null) {
		throw new TemplateError(`{{#${SECTION}}} opened at line ${sectionLine} is never closed`);
	}
	return root;
}

function checkNames(
	nodes: readonly TemplateNode[],
	known: ReadonlySet<string>,
	userFields: ReadonlySet<string>,
): void {
	for (const node of nodes) {
		if (node.type === "var" && !known.has(node.name)) {
			throw new TemplateError(`Unknown placeholder {{${node.name}}} at line ${node.line}`);
		}
		if (node.type === "section") {
			checkNames(node.body, new Set([...known, ...userFields]), userFields);
		}
	}
}

function expand(
	nodes: readonly TemplateNode[],
	scopes: readonly TemplateVariables[],
	ctx: TemplateContext,
): string {
	const escape = ctx.escape ?? ((value: string) => value);
	let out = "";
	for (const node of nodes) {
		if (node.type === "text") {
			out += node.value;
		} else if (node.type === "var") {
			const scope = scopes.find((vars) => Object.hasOwn(vars, node.name));
			if (!scope) {
				throw new TemplateError(`Unknown placeholder {{${node.name}}} at line ${node.line}`);
			}
			out += escape(scope[node.name]);
		} else {
			out += ctx.users
				.map((user) => expand(node.body, [user, ctx.variables], ctx))
				.join(ctx.separator);
		}
	}
	return out;
}

export function renderTemplate(source: string, ctx: TemplateContext): string {
	const nodes = parseTemplate(source);
	// Checked up front so a bad name inside a section fails even with no users.
	checkNames(nodes, new Set(Object.keys(ctx.variables)), new Set(ctx.userFields));
	return expand(nodes, [ctx.variables], ctx);
}
