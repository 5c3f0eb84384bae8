import { BadRequestException, Body, Controller, HttpCode, Post } from "@nestjs/common";
import { ShelfLifeService } from "./shelf-life.service";
import { toResolutionDto, toWindowDto } from "./shelf-life.dto";

@Controller("/api/shelf-life")
export class ShelfLifeController {
  constructor(private readonly service: ShelfLifeService) {}

  // { date } = pickup day as a user would type it; { deliveryDate } = fixed format
  @Post("calculate")
  @HttpCode(200)
  calculate(@Body() body: { date?: string; deliveryDate?: string }) {
    const settings = this.service.settings;

    if (typeof body?.deliveryDate === "string") {
      const result = this.service.forDeliveryText(body.deliveryDate);
      if (result.status !== "ok") throw new BadRequestException(`Date not recognized: ${result.input}`);
      return toWindowDto(result.window, settings);
    }

    if (typeof body?.date === "string") {
      const result = this.service.forPickupText(body.date);
      if (result.status !== "ok") throw new BadRequestException(`Date not recognized: ${result.input}`);
      return { ...toResolutionDto(result.resolution), ...toWindowDto(result.window, settings) };
    }

    throw new BadRequestException("Missing date or deliveryDate");
  }
}
