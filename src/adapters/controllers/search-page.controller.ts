import { ServerResponse } from "node:http";
import { DashboardController } from "./dashboard.controller.js";
import { SearchParamsSchema, paramsFromUrl } from "../validation.js";
import { ViewHelper } from "../../infrastructure/views/view-helper.js";

export class SearchPageController {
  constructor(private dashboardController: DashboardController) {}

  async getSearchPage(url: string, res: ServerResponse, submitted: boolean) {
    try {
      const parse = SearchParamsSchema.safeParse(paramsFromUrl(url));
      if (!parse.success) {
        res.writeHead(400, { "Content-Type": "text/html; charset=utf-8" });
        res.end(ViewHelper.escHtml(parse.error.issues[0]?.message));
        return;
      }
      const page = await this.dashboardController.getSearchPage(
        parse.data,
        submitted,
      );
      res.writeHead(page.status, { "Content-Type": "text/html; charset=utf-8" });
      res.end(page.html);
    } catch (e: unknown) {
      const message = e instanceof Error ? e.message : "Unknown error";
      res.writeHead(500, { "Content-Type": "text/plain" });
      res.end("Error generating search page: " + message);
    }
  }
}
