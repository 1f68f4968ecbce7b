import { expect } from '@oclif/test';
import axios from 'axios';
import nock from 'nock';
import sinon from 'sinon';
import ApiError from '../../../src/common/errors/api-error';
import InvalidInstanceCountError from '../../../src/common/errors/invalid-instance-count';
import RampUtils from '../../../src/render/ramp/ramp.utils';
import { MOCK_API_BASE_URL, MOCK_API_HOST, requestedInstances } from '../../utils/mocks';

describe('ramp utils', () => {
  const api = axios.create({ baseURL: MOCK_API_BASE_URL });
  const service_id = 'srv-test';

  describe('planSteps', () => {
    it('walks up one instance at a time', () => {
      expect(RampUtils.planSteps(1, 4)).to.deep.equal([2, 3, 4]);
    });

    it('walks down one instance at a time', () => {
      expect(RampUtils.planSteps(5, 2)).to.deep.equal([4, 3, 2]);
    });

    it('is empty when already at the target', () => {
      expect(RampUtils.planSteps(3, 3)).to.deep.equal([]);
    });

    it('rejects negative or fractional counts', () => {
      expect(() => RampUtils.planSteps(-1, 2)).to.throw(InvalidInstanceCountError);
      expect(() => RampUtils.planSteps(1, 2.5)).to.throw('Invalid scale request: target instance count must be a non-negative integer, got 2.5');
    });
  });

  it('reports the direction of travel', () => {
    expect(RampUtils.direction(1, 4)).to.equal('up');
    expect(RampUtils.direction(4, 1)).to.equal('down');
    expect(RampUtils.direction(2, 2)).to.equal('none');
  });

  describe('ramp', () => {
    it('pauses between steps but not before the first', async () => {
      const sleep = sinon.stub(RampUtils, 'sleep').resolves();
      const requested: number[] = [];
      nock(MOCK_API_HOST)
        .post(`/v1/services/${service_id}/scale`)
        .times(3)
        .reply(202, (_uri, body) => {
          requested.push(requestedInstances(body));
          return '';
        });

      const applied: number[] = [];
      const steps = await RampUtils.ramp(api, {
        service_id,
        current: 1,
        target: 4,
        interval: 1500,
        on_step: num_instances => applied.push(num_instances),
      });

      expect(steps).to.deep.equal([2, 3, 4]);
      expect(requested).to.deep.equal([2, 3, 4]);
      expect(applied).to.deep.equal([2, 3, 4]);
      expect(sleep.callCount).to.equal(2);
      expect(sleep.firstCall.args[0]).to.equal(1500);
    });

    it('stops at the first failed step', async () => {
      sinon.stub(RampUtils, 'sleep').resolves();
      nock(MOCK_API_HOST)
        .post(`/v1/services/${service_id}/scale`, { numInstances: 4 })
        .reply(202, '')
        .post(`/v1/services/${service_id}/scale`, { numInstances: 3 })
        .reply(503, '');

      const applied: number[] = [];
      const err = await RampUtils.ramp(api, {
        service_id,
        current: 5,
        target: 2,
        interval: 0,
        on_step: num_instances => applied.push(num_instances),
      }).catch(error => error);

      expect(err).to.be.instanceOf(ApiError);
      expect(applied).to.deep.equal([4]);
    });
  });
});
