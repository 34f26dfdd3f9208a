import { commonStyles } from "./style.js";

interface PageLayoutProps {
  title: string;
  content: string;
  sidebar?: string;
  styles?: string;
  footer?: string;
}

export function PageLayout({
  title,
  content,
  sidebar = "",
  styles = "",
  footer = "",
}: PageLayoutProps) {
  return `<!DOCTYPE html>
<html lang="es">
<head>
  <meta charset="UTF-8">
  <meta name="viewport" content="width=device-width, initial-scale=1.0">
  <title>${title}</title>
  <link rel="preconnect" href="https://fonts.googleapis.com">
  <link rel="preconnect" href="https://fonts.gstatic.com" crossorigin>
  <link href="https://fonts.googleapis.com/css2?family=JetBrains+Mono:wght@400;500;600;700&display=swap" rel="stylesheet">
  <style>
    ${commonStyles}
    ${styles}
  </style>
</head>
<body>
  <div id="page-loader">
    <div class="loader-spinner"></div>
    <div class="loader-text">Cargando datos...</div>
  </div>
  <div class="app-container">
    ${sidebar}
    <div class="content-wrapper">
      ${content}
      <footer class="footer">${footer}</footer>
    </div>
  </div>
  <script>
    (function() {
      var form = document.getElementById('search-form');
      if (form) form.addEventListener('submit', function() {
        var l = document.getElementById('page-loader'); if (l) l.style.display = 'flex';
      });
      window.addEventListener('pageshow', function() {
        var l = document.getElementById('page-loader'); if (l) l.style.display = 'none';
      });
    })();
  </script>
</body>
</html>`;
}
