import { DisplayTable } from "../../core/domain/entities/tracking-record.entity.js";
import { DatasetSummary, SearchOutcome } from "../../core/domain/types.js";
import { ViewHelper } from "./view-helper.js";

export interface SearchFormValues {
  reference: string;
  np: string;
  client: string;
}

export interface SearchViewProps {
  form: SearchFormValues;
  /** `null` until the user submits a search. */
  outcome: SearchOutcome | null;
}

const TIPS = [
  "Usa al menos un filtro",
  "Búsqueda no sensible a mayúsculas",
  "No se permite descargar el dataset completo",
];

export class SearchView {
  static getStyles(): string {
    return `
    .sidebar {
      width: 280px; flex-shrink: 0; background: var(--header-bg); color: var(--header-text);
      padding: 1.5rem 1.25rem; display: flex; flex-direction: column; gap: 1.25rem;
    }
    .sidebar h2 { margin: 0; font-size: 0.8rem; text-transform: uppercase; letter-spacing: 0.07em; }
    .sidebar ul { margin: 0; padding-left: 1rem; font-size: 0.75rem; line-height: 1.7; }
    .sidebar .tips { background: rgba(255,255,255,0.1); border-radius: var(--radius-sm); padding: 0.75rem; }

    .search-card {
      background: var(--surface); border: 1px solid var(--border-light); border-radius: var(--radius);
      box-shadow: 0 2px 8px rgba(0,0,0,0.04); padding: 1.25rem 1.5rem; margin-bottom: 1rem;
    }
    .search-card h2 { margin: 0 0 1rem 0; font-size: 0.95rem; }
    .search-grid { display: grid; grid-template-columns: repeat(3, 1fr); gap: 1rem; margin-bottom: 1rem; }
    .search-grid label { display: flex; flex-direction: column; gap: 0.35rem; font-size: 0.65rem; font-weight: 800; color: var(--muted); text-transform: uppercase; letter-spacing: 0.07em; }
    .search-input {
      height: 38px; padding: 0 0.85rem; border: 1px solid transparent; border-radius: 8px;
      font-size: 0.85rem; background: #f1f5f9; color: var(--text); outline: none;
    }
    .search-input:focus { border-color: var(--primary); background: white; }
    .btn-primary {
      width: 100%; height: 38px; border: none; border-radius: var(--radius-sm);
      background: var(--primary); color: white; font-weight: 700; cursor: pointer;
    }
    .btn-primary:hover { background: var(--primary-hover); }

    .alert { border-radius: var(--radius-sm); padding: 0.75rem 1rem; margin-bottom: 1rem; font-weight: 700; font-size: 0.8rem; }
    .alert-success { background: var(--pass-bg); color: var(--pass); }
    .alert-warning { background: var(--warning-bg); color: var(--warning); }
    .alert-error { background: var(--fail-bg); color: var(--fail); }

    .export-bar { display: flex; gap: 0.75rem; margin: 1rem 0; }
    .export-link {
      padding: 0.5rem 1rem; border-radius: var(--radius-sm); border: 1px solid rgba(176, 191, 201, 0.4);
      background: #f8fafc; color: var(--text-secondary); font-weight: 700; font-size: 0.75rem; text-decoration: none;
    }
    .export-link:hover { border-color: var(--primary); color: var(--primary); }

    .data-table-wrap {
      background: var(--surface); border: 1px solid var(--border-light); border-radius: var(--radius);
      overflow-x: auto; box-shadow: 0 2px 8px rgba(0,0,0,0.04);
    }
    .data-table { width: 100%; border-collapse: collapse; font-size: 0.8rem; }
    .data-table thead th {
      background: #f8fafc; color: var(--muted); font-size: 0.65rem; font-weight: 800;
      text-transform: uppercase; letter-spacing: 0.07em; padding: 0.75rem 1rem;
      border-bottom: 1px solid var(--border-light); text-align: left; white-space: nowrap;
    }
    .data-table tbody tr { border-bottom: 1px solid rgba(203,213,225,0.4); }
    .data-table tbody tr:nth-child(even) { background: var(--row-alt); }
    .data-table td { padding: 0.6rem 1rem; vertical-align: middle; white-space: nowrap; }
    `;
  }

  static renderSidebar(summary: DatasetSummary | null): string {
    const info = summary
      ? `
      <section>
        <h2>📊 Información</h2>
        <ul>
          <li><b>Total de registros:</b> ${ViewHelper.formatCount(summary.totalRecords)}</li>
          <li><b>Referencias únicas:</b> ${summary.uniqueReferences}</li>
          <li><b>NPs únicos:</b> ${summary.uniquePartNumbers}</li>
          <li><b>Clientes únicos:</b> ${summary.uniqueClients}</li>
        </ul>
      </section>
      ${
        summary.topStates
          ? `<section>
        <h2>📈 Distribución por Estado</h2>
        <ul>${summary.topStates
          .map((s) => `<li>${ViewHelper.escHtml(s.state)}: ${s.count}</li>`)
          .join("")}</ul>
      </section>`
          : ""
      }`
      : "";
    return `
    <aside class="sidebar">
      ${info}
      <section class="tips">
        <ul>${TIPS.map((t) => `<li>${t}</li>`).join("")}</ul>
      </section>
    </aside>`;
  }

  static renderForm(form: SearchFormValues): string {
    const field = (name: keyof SearchFormValues, label: string) => `
        <label>${label}
          <input class="search-input" type="text" name="${name}" value="${ViewHelper.escHtml(form[name])}">
        </label>`;
    return `
    <section class="search-card">
      <h2>🔍 Búsqueda de Pedidos</h2>
      <form id="search-form" method="get" action="/search">
        <div class="search-grid">
          ${field("reference", "Referencia")}
          ${field("np", "NP")}
          ${field("client", "Cliente")}
        </div>
        <button class="btn-primary" type="submit">🔎 Buscar</button>
      </form>
    </section>`;
  }

  static renderTable(table: DisplayTable): string {
    const head = table.columns
      .map((c) => `<th>${ViewHelper.escHtml(c)}</th>`)
      .join("");
    const body = table.rows
      .map(
        (row) =>
          `<tr>${table.columns
            .map((c) => `<td>${ViewHelper.escHtml(row[c])}</td>`)
            .join("")}</tr>`,
      )
      .join("\n");
    return `
    <div class="data-table-wrap">
      <table class="data-table">
        <thead><tr>${head}</tr></thead>
        <tbody>${body}</tbody>
      </table>
    </div>`;
  }

  static exportHref(form: SearchFormValues, format: "csv" | "xlsx"): string {
    const params = new URLSearchParams({ format });
    if (form.reference.trim()) params.set("reference", form.reference);
    if (form.np.trim()) params.set("np", form.np);
    if (form.client.trim()) params.set("client", form.client);
    return `/api/export?${params.toString()}`;
  }

  static renderOutcome(form: SearchFormValues, outcome: SearchOutcome | null): string {
    if (!outcome) return "";
    switch (outcome.status) {
      case "unavailable":
        return `<div class="alert alert-error">${ViewHelper.escHtml(outcome.message)}</div>`;
      case "rejected":
      case "empty":
        return `<div class="alert alert-warning">${ViewHelper.escHtml(outcome.message)}</div>`;
      case "ok": {
        const exportBar = outcome.exportAllowed
          ? `
      <div class="export-bar">
        <a class="export-link" href="${ViewHelper.escHtml(SearchView.exportHref(form, "csv"))}">📄 Descargar CSV</a>
        <a class="export-link" href="${ViewHelper.escHtml(SearchView.exportHref(form, "xlsx"))}">📊 Descargar Excel</a>
      </div>`
          : "";
        return `
      <div class="alert alert-success">${ViewHelper.escHtml(outcome.message)}</div>
      <h2>📋 Resultados</h2>
      ${SearchView.renderTable(outcome.display)}
      ${exportBar}`;
      }
    }
  }

  static render({ form, outcome }: SearchViewProps): string {
    return `
    <header class="header">
      <h1 class="header-main-title">Tracking BOL02</h1>
    </header>
    <main class="main">
      ${SearchView.renderForm(form)}
      ${SearchView.renderOutcome(form, outcome)}
    </main>`;
  }

  static renderUnavailable(message: string): string {
    return `
    <header class="header">
      <h1 class="header-main-title">Tracking BOL02</h1>
    </header>
    <main class="main">
      <div class="alert alert-error">${ViewHelper.escHtml(message)}</div>
    </main>`;
  }
}
