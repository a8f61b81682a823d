/**
 * Handlebars source for reports/summary.html
 */
export const SUMMARY_TEMPLATE = `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>{{assignment}} format check</title>
</head>
<body>
  <h1>{{assignment}} format check</h1>
  <p>{{passed}} of {{pluralize total "submission"}} passed.</p>
  <table>
    <thead>
      <tr><th>File</th><th>Student</th><th>Status</th><th>Issues</th></tr>
    </thead>
    <tbody>
      {{#each reports}}
      <tr class="{{#if format_ok}}ok{{else}}failed{{/if}}">
        <td>{{filename}}</td>
        <td>{{#if student_id}}{{student_id}}{{else}}-{{/if}}</td>
        <td>{{#if format_ok}}OK{{else}}{{pluralize format_issues.length "issue"}}{{/if}}</td>
        <td>{{#if format_issues.length}}<ul>{{#each format_issues}}<li>{{this}}</li>{{/each}}</ul>{{/if}}</td>
      </tr>
      {{/each}}
    </tbody>
  </table>
</body>
</html>
`;
