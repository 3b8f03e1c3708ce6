/**
 * Basic test to verify testing infrastructure is working
 */

describe('Testing Infrastructure', () => {
  it('should have Jest working', () => {
    expect(true).toBe(true);
  });

  it('should have test utilities available', () => {
    expect(global.testUtils).toBeDefined();
    expect(typeof global.testUtils.address).toBe('function');
    expect(typeof global.testUtils.wait).toBe('function');
  });

  it('should have environment variables set', () => {
    expect(process.env.NODE_ENV).toBe('test');
    expect(process.env.BASE_CHAIN_ID).toBe('8453');
    expect(process.env.UTILS_ACCOUNT_ADDRESS).toBe('0x000000000000000000000000000000000000ba5e');
  });

  it('should be able to use test utilities', async () => {
    expect(global.testUtils.address(0xa)).toBe('0x000000000000000000000000000000000000000a');

    const startTime = Date.now();
    await global.testUtils.wait(10);
    const endTime = Date.now();
    expect(endTime - startTime).toBeGreaterThanOrEqual(9);
  });
});
