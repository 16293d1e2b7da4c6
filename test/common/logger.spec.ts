import { expect } from 'chai';
import { format } from 'util';
import { createLogger, disableLogging, enableLogging, isLoggingEnabled } from '../../src/common/logger.js';

describe('Logging', () => {
	afterEach(() => {
		disableLogging();
	});

	it('should be disabled by default', () => {
		expect(isLoggingEnabled('extractor')).to.be.false;
	});

	it('should enable a namespace pattern', () => {
		enableLogging('sqlscope:parser:*');
		expect(isLoggingEnabled('parser:adapter')).to.be.true;
		expect(isLoggingEnabled('extractor')).to.be.false;
	});

	it('should route output to a custom log function', () => {
		const lines: string[] = [];
		enableLogging('sqlscope:logger-test', (...args: unknown[]) => { lines.push(format(...args)); });
		createLogger('logger-test')('found %d qualifiers', 3);
		expect(lines).to.have.length(1);
		expect(lines[0]).to.contain('found 3 qualifiers');
	});

	it('should stop logging once disabled', () => {
		enableLogging();
		expect(isLoggingEnabled('cli')).to.be.true;
		disableLogging();
		expect(isLoggingEnabled('cli')).to.be.false;
	});
});
