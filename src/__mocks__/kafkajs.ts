const mockSend = jest.fn().mockResolvedValue(undefined);
const mockConnect = jest.fn().mockResolvedValue(undefined);
const mockDisconnect = jest.fn().mockResolvedValue(undefined);
const mockSubscribe = jest.fn().mockResolvedValue(undefined);
const mockRun = jest.fn().mockResolvedValue(undefined);
const mockCommitOffsets = jest.fn().mockResolvedValue(undefined);
const mockConsumerOn = jest.fn();

const mockProducer = {
  connect: mockConnect,
  disconnect: mockDisconnect,
  send: mockSend,
};

const mockConsumer = {
  connect: jest.fn().mockResolvedValue(undefined),
  disconnect: jest.fn().mockResolvedValue(undefined),
  subscribe: mockSubscribe,
  run: mockRun,
  commitOffsets: mockCommitOffsets,
  on: mockConsumerOn,
  events: {
    CRASH: "consumer.crash",
    GROUP_JOIN: "consumer.group_join",
  },
};

const mockProducerFactory = jest.fn().mockReturnValue(mockProducer);
const mockConsumerFactory = jest.fn().mockReturnValue(mockConsumer);

const Kafka = jest.fn().mockImplementation(() => ({
  producer: mockProducerFactory,
  consumer: mockConsumerFactory,
}));

const Partitioners = {
  DefaultPartitioner: jest.fn(),
};

const logLevel = {
  NOTHING: 0,
  ERROR: 1,
  WARN: 2,
  INFO: 4,
  DEBUG: 5,
};

export {
  Kafka,
  Partitioners,
  logLevel,
  mockProducer,
  mockConsumer,
  mockProducerFactory,
  mockConsumerFactory,
  mockSend,
  mockConnect,
  mockDisconnect,
  mockSubscribe,
  mockRun,
  mockCommitOffsets,
  mockConsumerOn,
};
