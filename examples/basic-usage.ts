import { adaptTree, Definition, extract, type Node } from '../src';

/**
 * Basic usage example for treelens
 */
function main() {
  // 1. Some parser output (usually from a markdown/XML/JSON parser)
  const source = {
    kind: 'module',
    name: 'billing',
    body: [
      { kind: 'function', name: 'charge', visibility: 'public', lines: 24 },
      { kind: 'function', name: '_retry', visibility: 'private', lines: 9 },
      { kind: 'comment', text: 'generated' },
      { kind: 'class', name: 'Invoice', visibility: 'public', lines: 80 },
    ],
  };

  // 2. One-off extraction
  console.log(extract(source, 'body[0].name')); // 'charge'
  console.log(extract(source, {
    path: 'body',
    filter: { visibility: 'public' },
    map: { template: '${item.kind} ${item.name}' },
  })); // ['function charge', 'class Invoice']

  // 3. A definition for the whole tree
  const definition = Definition.fromSerialized({
    label: 'name',
    type: 'kind',
    children: { path: 'body', filter: { visibility: { ne: 'private' } } },
    content_lines: 'lines',
    icons: { module: '▤', function: 'ƒ', class: '◆' },
    type_overrides: {
      class: { label: { path: 'name', transform: 'upper' } },
    },
    ignore_types: ['comment'],
  });

  const tree = adaptTree(source, definition);

  // 4. Print it
  const print = (node: Node, depth = 0) => {
    console.log(`${'  '.repeat(depth)}${node.icon} ${node.label} (${node.contentLines})`);
    node.children.forEach(child => print(child, depth + 1));
  };
  print(tree);
  // ▤ billing (1)
  //   ƒ charge (24)
  //   ◆ INVOICE (80)
}

main();
