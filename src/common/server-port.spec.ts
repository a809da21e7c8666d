import { serverPort } from './server-port';
import { testConfig } from '../testing/test-data-source';

describe('serverPort', () => {
  const inherited = process.env.PORT;

  // ConfigService prefers the process environment over the values it was given
  beforeEach(() => {
    delete process.env.PORT;
  });

  afterEach(() => {
    if (inherited !== undefined) process.env.PORT = inherited;
  });

  it('reads PORT from the configuration', () => {
    expect(serverPort(testConfig({ PORT: '8080' }))).toBe(8080);
  });

  it('falls back to 3000 when PORT is missing or unusable', () => {
    expect(serverPort(testConfig())).toBe(3000);
    expect(serverPort(testConfig({ PORT: 'eighty' }))).toBe(3000);
    expect(serverPort(testConfig({ PORT: '0' }))).toBe(3000);
  });
});
