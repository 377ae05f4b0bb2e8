import { EventEmitter2 } from '@nestjs/event-emitter';
import { Test, TestingModule } from '@nestjs/testing';
import { Agent } from './cua.agent';
import { CuaModule } from './cua.module';
import { FakeDesktopBackend } from './testing/fake-desktop-backend';
import { FakeModelClient, toolCall } from './testing/fake-model-client';

describe('CuaModule', () => {
  let moduleRef: TestingModule;

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [
        CuaModule.forRoot({
          apiKey: 'test-secret',
          safetyLevel: 'strict',
          modelClient: new FakeModelClient([
            [toolCall('complete_task', { summary: 'nothing to do' })],
          ]),
          backend: new FakeDesktopBackend(),
        }),
      ],
    }).compile();
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('provides a configured agent', () => {
    const agent = moduleRef.get(Agent);

    expect(agent.config()).toMatchObject({
      apiKey: '****cret',
      safetyLevel: 'strict',
    });
  });

  it('shares the module event emitter with the agent', async () => {
    const agent = moduleRef.get(Agent);
    const events = moduleRef.get(EventEmitter2);
    const completed = jest.fn();
    events.on('agent.completed', completed);

    const result = await agent.do('check the module');

    expect(agent.events).toBe(events);
    expect(result.summary).toBe('nothing to do');
    expect(completed).toHaveBeenCalledTimes(1);
  });
});
