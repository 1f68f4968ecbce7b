import { Errors } from '@oclif/core';
import { expect, test } from '@oclif/test';
import AuthError from '../../src/common/errors/auth-error';
import { MockRenderApi } from '../utils/mocks';

const service = {
  id: 'srv-test',
  name: 'web-app',
  numInstances: 3,
};

describe('scale', function () {
  describe('absolute instance count', function () {
    new MockRenderApi()
      .scaleService(service.id, 5)
      .getApiMocks()
      .command(['scale', service.id, '5'])
      .it('sends the requested count without reading the service first', ctx => {
        expect(ctx.stdout).to.contain(`✓ Successfully scaled service ${service.id} to 5 instances`);
        expect(ctx.stdout).not.to.contain('Current instances');
      });

    new MockRenderApi()
      .scaleService(service.id, 0, { response: { id: service.id } })
      .getApiMocks()
      .command(['scale', service.id, '0'])
      .it('prints the response body as formatted JSON', ctx => {
        expect(ctx.stdout).to.contain(`✓ Successfully scaled service ${service.id} to 0 instances`);
        expect(ctx.stdout).to.contain('{\n  "id": "srv-test"\n}\n');
      });

    new MockRenderApi()
      .scaleService(service.id, 0)
      .getApiMocks()
      .env({ RENDER_SCALE_CONFIG_DIR: './test/fixtures/debug-config' })
      .command(['scale', service.id, '0'])
      .it('sends only the scale request when log_level is debug', ctx => {
        expect(ctx.stdout).to.contain(`✓ Successfully scaled service ${service.id} to 0 instances`);
        expect(ctx.stdout).to.contain('HTTP 202');
        expect(ctx.stdout).not.to.contain('Current instances');
      });

    new MockRenderApi()
      .getService(service)
      .getApiMocks()
      .command(['scale', service.id, '3', '--verbose'])
      .it('does nothing when the service is already at the target', ctx => {
        expect(ctx.stdout).to.contain('Service: web-app');
        expect(ctx.stdout).to.contain('Service is already at the target instance count. No action needed.');
        expect(ctx.stdout).not.to.contain('Successfully scaled');
      });

    new MockRenderApi()
      .getService(service)
      .getApiMocks()
      .command(['scale', service.id, '6', '--dry-run'])
      .it('reads the service but sends no scale request on a dry run', ctx => {
        expect(ctx.stdout).to.contain(`Scaling service 'web-app' (ID: ${service.id})`);
        expect(ctx.stdout).to.contain('  Current instances: 3');
        expect(ctx.stdout).to.contain('  Target instances:  6');
        expect(ctx.stdout).to.contain('[DRY RUN] Would scale service but --dry-run flag is set. Exiting.');
      });
  });

  describe('relative instance count', function () {
    new MockRenderApi()
      .getService(service)
      .scaleService(service.id, 5)
      .getApiMocks()
      .command(['scale', service.id, '--increase-by', '2'])
      .it('adds to the current count', ctx => {
        expect(ctx.stdout).to.contain('  Current instances: 3');
        expect(ctx.stdout).to.contain('  Target instances:  5');
        expect(ctx.stdout).to.contain(`✓ Successfully scaled service ${service.id} to 5 instances`);
      });

    new MockRenderApi()
      .getService(service)
      .scaleService(service.id, 0)
      .getApiMocks()
      .command(['scale', service.id, '--decrease-by', '7'])
      .it('never goes below zero instances', ctx => {
        expect(ctx.stdout).to.contain('  Target instances:  0');
        expect(ctx.stdout).to.contain(`✓ Successfully scaled service ${service.id} to 0 instances`);
      });

    new MockRenderApi()
      .getApiMocks()
      .command(['scale', service.id, '4', '--increase-by', '1'])
      .catch(err => {
        expect(err.message).to.equal('A number of instances cannot be combined with --increase-by or --decrease-by');
      })
      .it('rejects an absolute count combined with a relative flag');

    new MockRenderApi()
      .getApiMocks()
      .command(['scale', service.id])
      .catch(err => {
        expect(err.message).to.equal('Provide a number of instances, --increase-by or --decrease-by');
      })
      .it('requires a count or a relative flag');
  });

  describe('failures', function () {
    new MockRenderApi()
      .scaleService(service.id, 5, { response_code: 404, response: { message: 'service not found' } })
      .getApiMocks()
      .command(['scale', service.id, '5'])
      .catch(err => {
        expect(err).to.be.instanceOf(Errors.CLIError);
        if (err instanceof Errors.CLIError) {
          expect(err.oclif.exit).to.equal(1);
        }
        expect(err.message).to.equal(`Call to POST /services/${service.id}/scale returned HTTP 404\n{\n  "message": "service not found"\n}`);
      })
      .it('exits with 1 and surfaces the response body on a non-2xx response');

    new MockRenderApi()
      .scaleServiceWithError(service.id, 'socket hang up')
      .getApiMocks()
      .command(['scale', service.id, '5'])
      .catch(err => {
        expect(err.message).to.equal(`Unable to reach the Render API (POST /services/${service.id}/scale): socket hang up`);
      })
      .it('reports transport failures as network errors');

    test
      .stdout()
      .stderr()
      .command(['scale', service.id, '5'])
      .catch(err => {
        expect(err.message).to.equal(new AuthError().message);
        if (err instanceof Errors.CLIError) {
          expect(err.oclif.exit).to.equal(1);
        }
      })
      .it('makes no request without an API key');

    new MockRenderApi()
      .getApiMocks()
      .command(['scale', service.id, '2.5'])
      .catch(err => {
        expect(err.message).to.equal('Invalid scale request: num_instances must be a non-negative integer, got "2.5"');
      })
      .it('rejects a non-integer count before any request');

    new MockRenderApi()
      .getApiMocks()
      .command(['scale', service.id, '--', '-1'])
      .catch(err => {
        expect(err.message).to.equal('Invalid scale request: num_instances must be a non-negative integer, got "-1"');
      })
      .it('rejects a negative count before any request');

    new MockRenderApi()
      .getApiMocks()
      .command(['scale'])
      .exit(1)
      .it('exits with 1 when the service id is missing');
  });
});
