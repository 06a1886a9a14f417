import { DynamicModule, Logger, Module, Provider } from "@nestjs/common";
import type { BridgeConfig } from "../config/bridge.config";
import { KafkaBridge } from "../client/kafka.bridge";
import type { BridgeInstrumentation } from "../client/types";
import { KAFKA_BRIDGE } from "./bridge.constants";

/** Configuration for `BridgeModule.register()`. */
export interface BridgeModuleOptions {
  config: BridgeConfig;
  /** Tracing / metrics hooks. @see `KafkaBridgeOptions.instrumentation` */
  instrumentation?: BridgeInstrumentation[];
  /** Called when the consumer crashed for good. @see `KafkaBridgeOptions.onFatal` */
  onFatal?: (error: Error) => void;
}

/**
 * NestJS dynamic module that owns one `KafkaBridge`.
 *
 * The bridge is started by the provider factory, so it is consuming once the
 * application context is up, and drained and disconnected by its own
 * `onModuleDestroy` when the context closes.
 */
@Module({})
export class BridgeModule {
  static register(options: BridgeModuleOptions): DynamicModule {
    const bridgeProvider: Provider = {
      provide: KAFKA_BRIDGE,
      useFactory: () => BridgeModule.buildBridge(options),
    };

    return {
      global: true,
      module: BridgeModule,
      providers: [bridgeProvider],
      exports: [bridgeProvider],
    };
  }

  private static async buildBridge(
    options: BridgeModuleOptions,
  ): Promise<KafkaBridge> {
    const bridge = new KafkaBridge(options.config, {
      instrumentation: options.instrumentation,
      onFatal: options.onFatal,
      logger: new Logger(`KafkaBridge:${options.config.clientId}`),
    });
    await bridge.start();
    return bridge;
  }
}
