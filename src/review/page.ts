import type { ModelResponses } from "./data.js";

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(s: string): string {
  return s.replace(/[&<>"']/g, (c) => HTML_ESCAPES[c] ?? c);
}

const STYLE = `
    body { font-family: Arial, sans-serif; margin: 2em; }
    .model-section { margin-bottom: 2em; }
    .response { border: 1px solid #ccc; padding: 1em; margin-bottom: 1em; }
    .header { font-weight: bold; margin-bottom: 0.5em; }
    .preview { cursor: pointer; color: blue; text-decoration: underline; white-space: pre-wrap; }
    .full { display: none; white-space: pre-wrap; background: #f9f9f9; padding: 0.5em; margin-top: 0.5em; }`;

// One delegated listener; ids only ever travel through data-target attributes.
const SCRIPT = `
    document.addEventListener("click", function (event) {
      var preview = event.target.closest(".preview");
      if (!preview) return;
      var x = document.getElementById(preview.getAttribute("data-target"));
      if (x) x.style.display = x.style.display === "block" ? "none" : "block";
    });`;

/** HTML id for one response block. Store file names are not validated, so callers must HTML-escape it. */
export function responseElementId(model: string, roundNumber: number): string {
  return `resp-${model}-${roundNumber}`;
}

export function renderReviewPage(sessionName: string, data: ModelResponses[]): string {
  const sections = data.map(({ model, responses }) => {
    const blocks = responses.map((r) => {
      const id = escapeHtml(responseElementId(model, r.roundNumber));
      return `      <div class="response">
        <div class="header">Response #${r.roundNumber} | Convergence: ${r.convergence}% | Timestamp: ${escapeHtml(r.timestamp)}</div>
        <div class="preview" data-target="${id}">${escapeHtml(r.preview)} [ + ]</div>
        <div class="full" id="${id}">${escapeHtml(r.response)}</div>
      </div>`;
    });
    return `    <div class="model-section">
      <h2>Model: ${escapeHtml(model)}</h2>
${blocks.join("\n")}
    </div>`;
  });

  return `<!doctype html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>Review Opinions</title>
  <style>${STYLE}
  </style>
  <script>${SCRIPT}
  </script>
</head>
<body>
  <h1>Review Opinions for Session: ${escapeHtml(sessionName)}</h1>
${sections.join("\n")}
</body>
</html>
`;
}
