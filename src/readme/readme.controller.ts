import { Controller, Get, Header } from "@nestjs/common";
import { ApiExcludeController } from "@nestjs/swagger";
import { ReadmeService } from "./readme.service";

/**
 * Landing page at `/`, outside the `v1` prefix and the Swagger document.
 */
@ApiExcludeController()
@Controller()
export class ReadmeController {
  constructor(private readonly readmeService: ReadmeService) {}

  @Get()
  @Header("Content-Type", "text/html; charset=utf-8")
  @Header("Cache-Control", "public, max-age=300")
  landingPage(): Promise<string> {
    return this.readmeService.render();
  }
}
