import { Controller, Get } from "@nestjs/common";
import { ReferenceSnapshotService } from "./reference-data/reference-snapshot.service";

@Controller()
export class AppController {
  constructor(private readonly snapshots: ReferenceSnapshotService) {}

  @Get("health")
  health(): { status: string; referenceLoaded: boolean } {
    return {
      status: "ok",
      referenceLoaded: this.snapshots.peek() !== undefined,
    };
  }
}
