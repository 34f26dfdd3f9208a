/** User-facing texts of the dashboard, API and CLI. */
export const Messages = {
  unavailable: "No se pudieron cargar los datos.",
  noCriteria: "Debes ingresar al menos un criterio de búsqueda",
  noResults: "No se encontraron resultados",
  found: (n: number) => `Se encontraron ${n} registros`,
  exportForbidden: "No se permite descargar el dataset completo",
  pendingEntry: "Pendiente",
} as const;
