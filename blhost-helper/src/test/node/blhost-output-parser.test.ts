import { expect } from 'chai';
import {
  BlhostStatusResponse,
  decodeHexDump,
  knownErrorMessage,
} from '../../node/blhost-output-parser';

describe('blhost-output-parser', () => {
  describe('decodeHexDump', () => {
    it('should skip text lines and stop at the JSON document', () => {
      const data = decodeHexDump(
        ['Reading memory', '00 11 22', 'ff ee', '{"status": 0}', '33 44'].join(
          '\n'
        )
      );
      expect([...data]).to.be.deep.equal([0x00, 0x11, 0x22, 0xff, 0xee]);
    });

    it('should stop at the first blank line', () => {
      const data = decodeHexDump('\n01 02\n\n03 04\n');
      expect([...data]).to.be.deep.equal([0x01, 0x02]);
    });

    it('should only keep two-digit tokens', () => {
      const data = decodeHexDump('0a0b 0c D');
      expect([...data]).to.be.deep.equal([0x0c]);
    });

    it('should decode nothing from an empty output', () => {
      expect(decodeHexDump('')).to.have.lengthOf(0);
    });
  });

  describe('BlhostStatusResponse', () => {
    it('should default the response words', () => {
      const response = BlhostStatusResponse.parse({ status: { value: 0 } });
      expect(response).to.be.deep.equal({
        status: { value: 0 },
        response: [],
      });
      expect(response && BlhostStatusResponse.isSuccess(response)).to.be.true;
    });

    it('should keep the extra status properties', () => {
      const response = BlhostStatusResponse.parse({
        command: 'get-property',
        status: { value: 10004, description: 'Unknown property.', extra: 1 },
      });
      expect(response?.status).to.be.deep.equal({
        value: 10004,
        description: 'Unknown property.',
        extra: 1,
      });
      expect(response && BlhostStatusResponse.isSuccess(response)).to.be.false;
    });

    it('should reject other documents', () => {
      expect(BlhostStatusResponse.parse('text')).to.be.undefined;
      expect(BlhostStatusResponse.parse({ status: 'ok' })).to.be.undefined;
    });
  });

  describe('knownErrorMessage', () => {
    it('should explain a missing device', () => {
      expect(
        knownErrorMessage('ERROR: SpsdkNoDeviceFoundError: No USB device found')
      ).to.be.equal(
        'Device not found, please check connection and bootloader mode'
      );
    });

    it('should leave other errors alone', () => {
      expect(knownErrorMessage('kStatus_Fail')).to.be.undefined;
    });
  });
});
