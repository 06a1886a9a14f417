import { DynamicModule, Module } from "@nestjs/common";
import type { BridgeConfig } from "./config/bridge.config";
import { BridgeModule } from "./nest/bridge.module";
import { otelInstrumentation } from "./otel";

@Module({})
export class AppModule {
  static forRoot(
    config: BridgeConfig,
    onFatal: (error: Error) => void,
  ): DynamicModule {
    return {
      module: AppModule,
      imports: [
        BridgeModule.register({
          config,
          instrumentation: [otelInstrumentation()],
          onFatal,
        }),
      ],
    };
  }
}
