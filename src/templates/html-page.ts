// Template for the HTML component diagram page.
// The graph is drawn client-side by Cytoscape.js with the dagre layout.

export interface HtmlPageParts {
  title: string;
  descriptionHtml: string;
  componentsHtml: string;
  cytoscapeJson: string;
}

const CYTOSCAPE_SCRIPTS = [
  "https://unpkg.com/cytoscape@3.30.2/dist/cytoscape.min.js",
  "https://unpkg.com/dagre@0.8.5/dist/dagre.min.js",
  "https://unpkg.com/cytoscape-dagre@2.5.0/cytoscape-dagre.js",
];

const STYLE = `
    body { font-family: -apple-system, BlinkMacSystemFont, "Segoe UI", Helvetica, Arial, sans-serif; margin: 0; color: #1f2328; }
    header { padding: 16px 24px; border-bottom: 1px solid #d0d7de; }
    header h1 { margin: 0; font-size: 20px; }
    #cy { width: 100%; height: 520px; border-bottom: 1px solid #d0d7de; }
    main { padding: 8px 24px 32px; max-width: 960px; }
    .component { border: 1px solid #d0d7de; border-radius: 6px; padding: 12px 16px; margin: 16px 0; }
    .component h3 { margin-top: 0; }
    .references { padding-left: 20px; }
    code { font-size: 85%; background: #f6f8fa; padding: 2px 4px; border-radius: 4px; }`;

const GRAPH_SCRIPT = `
    const graph = JSON.parse(document.getElementById("graph-data").textContent);
    if (typeof cytoscapeDagre !== "undefined") cytoscape.use(cytoscapeDagre);
    const cy = cytoscape({
      container: document.getElementById("cy"),
      elements: graph.elements,
      layout: { name: typeof cytoscapeDagre !== "undefined" ? "dagre" : "breadthfirst", rankDir: "LR" },
      style: [
        { selector: "node", style: { label: "data(label)", shape: "round-rectangle", "background-color": "#ddf4ff", "border-color": "#54aeff", "border-width": 1, "text-valign": "center", "text-halign": "center", "text-wrap": "wrap", width: "label", height: "label", padding: "12px" } },
        { selector: "node[?hasLink]", style: { "background-color": "#fff8c5", "border-color": "#d4a72c", "border-width": 2 } },
        { selector: "edge", style: { label: "data(label)", "curve-style": "bezier", "target-arrow-shape": "triangle", "font-size": 10, width: 1.5 } }
      ]
    });
    cy.on("tap", "node", (event) => {
      const url = event.target.data("linkUrl");
      if (url) window.location.href = url;
    });`;

export function renderHtmlPage(parts: HtmlPageParts): string {
  const scripts = CYTOSCAPE_SCRIPTS.map((src) => `  <script src="${src}"></script>`).join("\n");
  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <meta name="viewport" content="width=device-width, initial-scale=1">
  <title>${parts.title}</title>
  <style>${STYLE}
  </style>
${scripts}
</head>
<body>
  <header><h1>${parts.title}</h1></header>
  <div id="cy"></div>
  <main>
    <h2>Details</h2>
    <p>${parts.descriptionHtml}</p>
${parts.componentsHtml}
  </main>
  <script type="application/json" id="graph-data">${parts.cytoscapeJson}</script>
  <script>${GRAPH_SCRIPT}
  </script>
</body>
</html>
`;
}
