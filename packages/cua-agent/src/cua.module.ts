import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { EventEmitter2, EventEmitterModule } from '@nestjs/event-emitter';
import { AgentOptions } from './config/agent.options';
import { Agent } from './cua.agent';

export const CUA_AGENT_OPTIONS = 'CUA_AGENT_OPTIONS';

@Module({})
export class CuaModule {
  static forRoot(options: AgentOptions = {}): DynamicModule {
    return {
      module: CuaModule,
      imports: [
        ConfigModule.forRoot({ ignoreEnvFile: true }),
        EventEmitterModule.forRoot(),
      ],
      providers: [
        { provide: CUA_AGENT_OPTIONS, useValue: options },
        {
          provide: Agent,
          useFactory: (
            agentOptions: AgentOptions,
            configService: ConfigService,
            events: EventEmitter2,
          ) => new Agent(agentOptions, { configService, events }),
          inject: [CUA_AGENT_OPTIONS, ConfigService, EventEmitter2],
        },
      ],
      exports: [Agent],
    };
  }
}
