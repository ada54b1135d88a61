import { jest, describe, it, expect } from '@jest/globals';
import { NvidiaSmiProbe, parseNvidiaSmiOutput } from '../../../src/device/DeviceProbe.js';

jest.mock('../../../src/utils/logger.js', () => {
  const mockLogger = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn() };
  return {
    logger: mockLogger,
    getJobLogger: jest.fn(() => mockLogger),
    errorMessage: (error: unknown) => (error instanceof Error ? error.message : String(error))
  };
});

describe('parseNvidiaSmiOutput', () => {
  it('should read name and memory of the first GPU', () => {
    const stdout = 'Test GPU 4090, 20480, 24564\nSecond GPU, 100, 200\n';
    expect(parseNvidiaSmiOutput(stdout)).toEqual({
      gpuAvailable: true,
      gpuName: 'Test GPU 4090',
      memoryFreeMb: 20480,
      memoryTotalMb: 24564
    });
  });

  it('should skip leading blank lines', () => {
    expect(parseNvidiaSmiOutput('\r\n  \r\nTest GPU, 1024, 2048\r\n').gpuName).toBe('Test GPU');
  });

  it('should report no GPU for empty output', () => {
    expect(parseNvidiaSmiOutput('')).toEqual({ gpuAvailable: false });
  });

  it('should report no GPU for malformed rows', () => {
    expect(parseNvidiaSmiOutput('Test GPU, 1024')).toEqual({ gpuAvailable: false });
    expect(parseNvidiaSmiOutput('Test GPU, [N/A], [N/A]')).toEqual({ gpuAvailable: false });
  });
});

describe('NvidiaSmiProbe', () => {
  it('should fall back to CPU when the binary cannot be run', async () => {
    const probe = new NvidiaSmiProbe('/nonexistent/nvidia-smi-test-binary', 1000);
    await expect(probe.probe()).resolves.toEqual({ gpuAvailable: false });
  });
});
