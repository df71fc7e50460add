import { Module } from "@nestjs/common";
import wordListConfig from "./config/word-list.config";
import { ConfigModule } from "@nestjs/config";
import { WordListModule } from "./word-list/word-list.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [wordListConfig],
    }),
    WordListModule,
  ],
})
export class AppModule {}
