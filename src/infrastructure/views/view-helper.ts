export class ViewHelper {
  static escHtml(s: string | null | undefined): string {
    return String(s ?? "")
      .replace(/&/g, "&amp;")
      .replace(/</g, "&lt;")
      .replace(/>/g, "&gt;")
      .replace(/"/g, "&quot;");
  }

  static formatCount(n: number): string {
    return n.toLocaleString("en-US");
  }
}
