import { Module } from "@nestjs/common";
import { BOT_CONFIG, type BotConfig, type SheetSettings } from "../config/bot-config";
import { GoogleSheetSource } from "./google-sheet.source";
import { ORDER_SHEET_SOURCE, type OrderSheetSource } from "./sheet-source";
import { XlsxSheetSource } from "./xlsx-sheet.source";

export function createSheetSource(settings: SheetSettings): OrderSheetSource {
  return settings.source === "xlsx" ? new XlsxSheetSource(settings) : new GoogleSheetSource(settings);
}

@Module({
  providers: [
    {
      provide: ORDER_SHEET_SOURCE,
      inject: [BOT_CONFIG],
      useFactory: (config: BotConfig) => createSheetSource(config.sheet),
    },
  ],
  exports: [ORDER_SHEET_SOURCE],
})
export class SheetsModule {}
