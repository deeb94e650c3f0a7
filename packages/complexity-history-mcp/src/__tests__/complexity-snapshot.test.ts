import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { analyzeComplexitySnapshot } from '../tools/complexity-snapshot.js';
import { analyzerConfigSchema } from '../config.js';

const config = analyzerConfigSchema.parse({});

describe('analyzeComplexitySnapshot', () => {
  let root: string;

  function write(relativePath: string, content: string): void {
    const target = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(target), { recursive: true });
    fs.writeFileSync(target, content);
  }

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'snapshot-'));
    vi.useFakeTimers({ toFake: ['Date'] });
    vi.setSystemTime(new Date(2024, 2, 1, 9));
  });

  afterEach(() => {
    vi.useRealTimers();
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('unions the signals of every declared module', async () => {
    write(
      'pom.xml',
      '<project><modules><module>api</module><module>worker</module></modules></project>'
    );
    write(
      'api/pom.xml',
      `<project>
        <dependencies>
          <dependency>
            <groupId>org.springframework.boot</groupId>
            <artifactId>spring-boot-starter-web</artifactId>
          </dependency>
          <dependency>
            <groupId>org.junit.jupiter</groupId>
            <artifactId>junit-jupiter</artifactId>
            <version>5.10.1</version>
            <scope>test</scope>
          </dependency>
        </dependencies>
      </project>`
    );
    write(
      'api/src/main/java/OrdersController.java',
      [
        '@RestController',
        'public class OrdersController {',
        '  @GetMapping("/orders")',
        '  public List<Order> list() { return service.list(); }',
        '  @PostMapping("/orders/{id}/cancel")',
        '  public void cancel(@PathVariable String id) { service.cancel(id); }',
        '}',
      ].join('\n')
    );
    write(
      'worker/pom.xml',
      `<project>
        <dependencies>
          <dependency>
            <groupId>org.slf4j</groupId>
            <artifactId>slf4j-api</artifactId>
            <version>2.0.9</version>
          </dependency>
        </dependencies>
      </project>`
    );
    write('worker/src/main/java/StockClient.java', 'String url = "http://inventory:8080/stock";\n');

    const result = await analyzeComplexitySnapshot({ path: root }, config);

    expect(result.modules).toEqual(['api', 'worker']);
    expect(result.issues).toEqual([]);
    expect(result.record).toEqual({
      service: path.basename(root),
      date: '2024-03-01',
      endpointCount: 2,
      dependencyCount: 2,
      callCount: 1,
      dependencies: [
        'org.slf4j:slf4j-api:2.0.9',
        'org.springframework.boot:spring-boot-starter-web:<inherited>',
      ],
      endpoints: ['GET /orders', 'POST /orders/{id}/cancel'],
      calls: ['http://inventory:8080/stock'],
    });
  });

  it('reports a missing module directory as an issue', async () => {
    write('pom.xml', '<project><modules><module>gone</module></modules></project>');

    const result = await analyzeComplexitySnapshot({ path: root }, config);

    expect(result.modules).toEqual(['gone']);
    expect(result.record.endpointCount).toBe(0);
    expect(result.issues.map(issue => issue.stage)).toEqual(['walk']);
  });
});
