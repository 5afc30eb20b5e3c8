import {
  createColorizer,
  createFixtureDirectory,
  runReport,
  type ColorRule,
} from '../src';

/**
 * Basic usage example for mailbox-report
 */
async function main() {
  // 1. Color a table rendered elsewhere
  const table = [
    '<table>',
    '<tr><th>Name</th><th>Size</th></tr>',
    '<tr><td>Alice</td><td>120</td></tr>',
    '<tr><td>Bob</td><td>50</td></tr>',
    '</table>',
  ];

  const colorizer = createColorizer(table)
    .color({ property: 'Size', color: 'red', filter: 'Size -gt 100' })
    .color({ property: 'Name', color: '#eef', filter: "Name -like 'b*'", scope: 'row' });

  console.log(colorizer.html());
  console.log(colorizer.applied.map(a => `${a.rule.filter}: ${a.matched}`));

  // 2. A full report over the sample directory, with one extra rule
  const rules: ColorRule[] = [
    { property: 'Status', color: '#f8d7da', filter: "Status -ne 'OK'", scope: 'row' },
    { property: 'RecoverableMB', color: 'orange', filter: 'RecoverableMB -ge 200' },
  ];

  const result = await runReport(
    { scope: { kind: 'database', database: 'DB01' }, rules },
    { directory: createFixtureDirectory() }
  );

  console.log(result.subject);
  console.log(result.table.join('\n'));
}

main().catch(err => {
  console.error(err);
  process.exitCode = 1;
});
