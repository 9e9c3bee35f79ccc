import { renderToStaticMarkup } from 'react-dom/server';
import { Token, TokenKind, Program, Statement, Expression, Block, SymbolTable } from './types';
import { CompileResult } from './compiler/pipeline';

// --- CSS for Tree Diagram ---
const TREE_CSS = `
.tf-tree { display: inline-table; margin: 0 auto; }
.tf-tree ul {
  padding-top: 20px;
  position: relative;
  display: flex;
  justify-content: center;
}
.tf-tree li {
  float: left; text-align: center;
  list-style-type: none;
  position: relative;
  padding: 20px 10px 0 10px;
}
.tf-tree li::before, .tf-tree li::after {
  content: '';
  position: absolute; top: 0; right: 50%;
  border-top: 1px solid #666;
  width: 50%; height: 20px;
}
.tf-tree li::after { right: auto; left: 50%; border-left: 1px solid #666; }
.tf-tree li:only-child::after, .tf-tree li:only-child::before { display: none; }
.tf-tree li:only-child { padding-top: 0; }
.tf-tree li:first-child::before, .tf-tree li:last-child::after { border: 0 none; }
.tf-tree li:last-child::before { border-right: 1px solid #666; border-radius: 0 5px 0 0; }
.tf-tree li:first-child::after { border-radius: 5px 0 0 0; }
.tf-tree ul ul::before {
  content: '';
  position: absolute; top: 0; left: 50%;
  border-left: 1px solid #666;
  width: 0; height: 20px;
}
.tf-node {
  display: inline-block;
  padding: 8px 12px;
  border: 1px solid #444;
  background-color: #2d2d2d;
  color: #ccc;
  border-radius: 4px;
  font-size: 12px;
  min-width: 80px;
}
.tf-node .type { font-weight: bold; color: #60a5fa; display: block; margin-bottom: 2px; }
.tf-node .detail { font-family: monospace; color: #4ade80; font-size: 11px; }
`;

const PAGE_CSS = `
body { background: #111827; color: #e5e7eb; font-family: sans-serif; margin: 0; padding: 16px; }
h2 { color: #93c5fd; border-bottom: 1px solid #374151; padding-bottom: 4px; }
table { border-collapse: collapse; font-size: 12px; margin-bottom: 16px; }
th, td { padding: 4px 8px; border-bottom: 1px solid #374151; text-align: left; }
th { color: #9ca3af; }
pre { background: #1e1e1e; padding: 12px; font-size: 12px; overflow: auto; }
.empty { color: #6b7280; font-style: italic; }
`;

// --- AST to tree data ---

export interface TreeData {
  label: string;
  details: string[];
  children: TreeData[];
}

function leaf(label: string, details: string[]): TreeData {
  return { label, details, children: [] };
}

export function expressionTree(e: Expression): TreeData {
  switch (e.kind) {
    case 'variable':
      return leaf('Var', [`${e.shadow ? 'shadow ' : ''}${e.name}: ${e.type}`]);
    case 'constant':
      return leaf('Const', [`${e.value}: ${e.type}`]);
    case 'unary':
      return { label: `Op(${e.operator === 'negate' ? '-' : '!'})`, details: [e.type], children: [expressionTree(e.operand)] };
    case 'binary':
      return {
        label: `Op(${e.operator})`,
        details: [e.type],
        children: [expressionTree(e.left), expressionTree(e.right)]
      };
  }
}

export function statementTree(stmt: Statement): TreeData {
  switch (stmt.kind) {
    case 'assignment':
      return {
        label: 'Assign',
        details: stmt.targets.map(t => `${t.shadow ? 'shadow ' : ''}${t.name}`),
        children: stmt.values.map(expressionTree)
      };
    case 'condition': {
      const children = [expressionTree(stmt.test), blockTree(stmt.then, 'Then')];
      if (stmt.otherwise.statements.length > 0) children.push(blockTree(stmt.otherwise, 'Else'));
      return { label: 'If', details: [], children };
    }
    case 'loop': {
      const children: TreeData[] = [];
      if (!stmt.init.isEmpty()) children.push(statementTree(stmt.init));
      children.push(...stmt.tests.map(expressionTree));
      if (!stmt.step.isEmpty()) children.push(statementTree(stmt.step));
      children.push(blockTree(stmt.body, 'Body'));
      return { label: 'For', details: [], children };
    }
    case 'block':
      return blockTree(stmt, 'Block');
  }
}

export function blockTree(block: Block, label: string): TreeData {
  return { label, details: [`scope ${block.scope}`], children: block.statements.map(statementTree) };
}

// --- Components ---

const TreeNodeRenderer = ({ node }: { node: TreeData }) => {
  return (
    <li>
      <div className="tf-node">
        <span className="type">{node.label}</span>
        {node.details.map((d, i) => (
          <div key={i} className="detail">{d}</div>
        ))}
      </div>
      {node.children.length > 0 && (
        <ul>
          {node.children.map((child, i) => (
            <TreeNodeRenderer key={i} node={child} />
          ))}
        </ul>
      )}
    </li>
  );
};

const ASTGraphViewer = ({ program }: { program: Program }) => {
  return (
    <div className="tf-tree">
      <ul>
        <TreeNodeRenderer node={blockTree(program.root, 'Program')} />
      </ul>
    </div>
  );
};

const TokenTable = ({ tokens }: { tokens: Token[] }) => {
  if (tokens.length === 0) return <div className="empty">No tokens</div>;
  return (
    <table>
      <thead>
        <tr><th>Line</th><th>Column</th><th>Kind</th><th>Text</th></tr>
      </thead>
      <tbody>
        {tokens.map((t, i) => (
          <tr key={i}>
            <td>{t.line}</td>
            <td>{t.column}</td>
            <td>{TokenKind[t.kind]}</td>
            <td>{t.text}</td>
          </tr>
        ))}
      </tbody>
    </table>
  );
};

const SymbolTableView = ({ table }: { table: SymbolTable }) => {
  const entries = [...table.entries.values()];
  return (
    <div>
      <h3>Scope {table.id}{table.parent === null ? ' (global)' : ` (parent ${table.parent})`}</h3>
      {entries.length === 0 ? (
        <div className="empty">No bindings in this scope</div>
      ) : (
        <table>
          <thead>
            <tr><th>Name</th><th>Type</th><th>Storage</th><th>Shadowing</th></tr>
          </thead>
          <tbody>
            {entries.map((e, i) => (
              <tr key={i}>
                <td>{e.name}</td>
                <td>{e.type}</td>
                <td>{e.storage}</td>
                <td>{e.shadowing ? 'yes' : 'no'}</td>
              </tr>
            ))}
          </tbody>
        </table>
      )}
    </div>
  );
};

export const CompileReport = ({ title, result }: { title: string, result: CompileResult }) => {
  return (
    <html>
      <head>
        <meta charSet="utf-8" />
        <title>{title}</title>
        <style dangerouslySetInnerHTML={{ __html: PAGE_CSS + TREE_CSS }} />
      </head>
      <body>
        <h1>{title}</h1>
        <h2>Tokens</h2>
        <TokenTable tokens={result.tokens} />
        <h2>Syntax tree</h2>
        <ASTGraphViewer program={result.program} />
        <h2>Scopes</h2>
        {result.program.scopes.tables.map(t => (
          <SymbolTableView key={t.id} table={t} />
        ))}
        <h2>Assembly</h2>
        <pre>{result.assembly}</pre>
      </body>
    </html>
  );
};

export function renderReport(result: CompileResult, title: string = 'Compilation report'): string {
  return '<!DOCTYPE html>' + renderToStaticMarkup(<CompileReport title={title} result={result} />);
}
