// Tests for the audit report validator

import { describe, it, expect, beforeAll } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { AuditReportContract } from '../../models/template.js';
import { BUNDLED_TEMPLATES_DIR } from '../template/template-service.js';
import { parseTemplateFile } from '../template/template-parser.js';
import { AuditReportValidator, sortFindingsBySeverity } from './audit-validator.js';

const BACKLOG_ITEM = `- Objetivo: parametrizar consultas
- Justificativa: risco de injeção
- Checklist: trocar concatenação por parâmetros
- Risco: baixo
- Estimativa: 2h
- Critérios de aceite: nenhum SQL montado por concatenação`;

const REPORT_PT = `## Relatório de auditoria

### Resumo executivo
O módulo concentra regras de negócio e acesso a dados na mesma classe.
Há uma consulta SQL montada por concatenação de strings.
Os testes existentes cobrem apenas o caminho feliz.

### Notas
- Nomenclatura: 80/100
- Estilo: 75/100
- SOLID: 55/100
- Segurança: 40/100
- Desempenho: 70/100
- Testabilidade: 50/100
- **Nota geral**: 60/100

### Tabela de achados
| Categoria | Severidade | Impacto | Evidência | Recomendação |
|---|---|---|---|---|
| Estilo | Baixa | Leitura difícil | linhas com 120 colunas | Aplicar um formatador |
| Segurança | Crítica | Injeção de SQL | \`cursor.execute("..." + nome)\` | Usar parâmetros |
| SOLID | Alta | Classe com muitas responsabilidades | \`PedidoService\` | Separar o repositório |

### Detalhamento por categoria
Segurança: ver o segundo achado.

### Testes sugeridos
- test_busca_por_nome_usa_parametros

### Ferramentas recomendadas
- ruff, bandit

### Premissas e limitações
Sem acesso ao restante do projeto.

### Backlog de refatoração

#### Agora
${BACKLOG_ITEM}

#### Próximo ciclo
${BACKLOG_ITEM}

#### Depois
${BACKLOG_ITEM}

### Mapa de módulos
- pedidos/service.py

### Ganhos rápidos
- Rodar o formatador
`;

const REPORT_EN = `# Executive summary
Two functions share global state.

# Scores
| Category | Score |
|---|---|
| Naming | 90 |
| Style | 85 |
| Design | 70 |
| Security (OWASP) | 95 |
| Performance | 80 |
| Testability | 60 |
| Overall | 80 |

# Findings
| Category | Severity | Impact | Evidence | Recommendation |
|---|---|---|---|---|
| Testability | Medium | Hard to isolate | \`CACHE = {}\` | Inject the cache |

# Category details
Testability is the weakest area.

# Suggested tests
- test_cache_is_isolated

# Recommended tools
- pytest

# Refactoring backlog
**Now**
- Objective: inject the cache
- Rationale: shared state
- Checklist: add a parameter
- Risk: low
- Estimate: 1h
- Acceptance criteria: tests run in any order

**Next cycle**
| Objective | Rationale | Checklist | Risk | Estimate | Acceptance criteria |
|---|---|---|---|---|---|

**Later**
- Objective: split the module
- Rationale: size
- Checklist: move helpers
- Risk: medium
- Estimate: 1d
- Acceptance criteria: no cycles

# Module map
- app.py

# Quick wins
- Remove unused imports
`;

describe('AuditReportValidator', () => {
  let contract: AuditReportContract;
  let validator: AuditReportValidator;

  beforeAll(async () => {
    const text = await fs.readFile(path.join(BUNDLED_TEMPLATES_DIR, 'python-code-audit.md'), 'utf-8');
    const { metadata } = parseTemplateFile(text, 'python-code-audit');
    if (metadata.outputContract.kind !== 'audit-report') {
      throw new Error('python-code-audit must declare an audit-report contract');
    }
    contract = metadata.outputContract;
    validator = new AuditReportValidator(contract);
  });

  describe('valid reports', () => {
    it('should accept a complete Portuguese report', () => {
      const result = validator.validate(REPORT_PT);

      expect(result.errors).toEqual([]);
      expect(result.warnings).toEqual([]);
      expect(result.valid).toBe(true);
      expect(result.report.summaryLines).toHaveLength(3);
      expect(result.report.scores.map(s => [s.categoryId, s.value])).toEqual([
        ['naming', 80],
        ['style', 75],
        ['solid', 55],
        ['security', 40],
        ['performance', 70],
        ['testability', 50]
      ]);
      expect(result.report.overall?.value).toBe(60);
      expect(result.report.findings.map(f => f.severity)).toEqual(['low', 'critical', 'high']);
      expect(result.report.horizons).toEqual(['now', 'nextCycle', 'later']);
    });

    it('should accept an English report with a score table and bold horizon markers', () => {
      const result = validator.validate(REPORT_EN);

      expect(result.errors).toEqual([]);
      expect(result.warnings.map(w => w.field)).toEqual(['sections.assumptions']);
      expect(result.valid).toBe(true);
      expect(result.report.scores.find(s => s.categoryId === 'security')?.value).toBe(95);
      expect(result.report.findings).toEqual([{
        category: 'Testability',
        severity: 'medium',
        severityRank: 2,
        severityLabel: 'Medium',
        impact: 'Hard to isolate',
        evidence: '`CACHE = {}`',
        recommendation: 'Inject the cache',
        line: 18
      }]);
      expect(result.report.horizons).toEqual(['now', 'nextCycle', 'later']);
    });

    it('should only warn about the optional assumptions section', () => {
      const report = REPORT_PT.replace('### Premissas e limitações\nSem acesso ao restante do projeto.\n\n', '');
      const result = validator.validate(report);

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual([{
        field: 'sections.assumptions',
        message: 'Missing section "Premissas e limitações" / "Assumptions and limitations"'
      }]);
    });
  });

  describe('sections', () => {
    it('should reject a report missing a required section', () => {
      const report = REPORT_PT.replace('### Ganhos rápidos\n- Rodar o formatador\n', '');
      const result = validator.validate(report);

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([{ field: 'sections.quickWins', message: 'Missing section "Ganhos rápidos" / "Quick wins"' }]);
    });

    it('should ignore headings inside fenced code', () => {
      const report = REPORT_PT.replace('### Ganhos rápidos\n- Rodar o formatador\n', '```\n### Ganhos rápidos\n```\n');
      const result = validator.validate(report);

      expect(result.errors.map(e => e.field)).toEqual(['sections.quickWins']);
    });

    it('should reject an executive summary over the line limit', () => {
      const longSummary = Array.from({ length: 11 }, (_, i) => `Linha ${i + 1}.`).join('\n');
      const report = REPORT_PT.replace(/### Resumo executivo\n[\s\S]*?\n\n### Notas/, `### Resumo executivo\n${longSummary}\n\n### Notas`);
      const result = validator.validate(report);

      expect(result.errors).toEqual([{
        field: 'sections.executiveSummary',
        message: 'Executive summary has 11 lines; the limit is 10',
        line: 3
      }]);
    });
  });

  describe('scores', () => {
    it('should reject a score outside 0-100 and report it missing', () => {
      const result = validator.validate(REPORT_PT.replace('Segurança: 40/100', 'Segurança: 140/100'));

      expect(result.errors.map(e => e.message)).toEqual([
        'Score for "Segurança" must be between 0 and 100 (got 140)',
        'Missing score for "Segurança"'
      ]);
    });

    it('should reject fractional scores', () => {
      const result = validator.validate(REPORT_PT.replace('Estilo: 75/100', 'Estilo: 7.5'));

      expect(result.errors[0]).toEqual({
        field: 'scores.style',
        message: 'Score for "Estilo" must be an integer (got 7.5)',
        line: 10
      });
    });

    it('should reject a category scored twice', () => {
      const result = validator.validate(REPORT_PT.replace('- Estilo: 75/100', '- Estilo: 75/100\n- Legibilidade: 70/100'));

      expect(result.errors).toEqual([{ field: 'scores.style', message: 'Score for "Estilo" appears 2 times', line: 11 }]);
      expect(result.report.scores.find(s => s.categoryId === 'style')?.value).toBe(75);
    });

    it('should require the overall score', () => {
      const result = validator.validate(REPORT_PT.replace('- **Nota geral**: 60/100\n', ''));

      expect(result.errors).toEqual([{ field: 'scores.overall', message: 'Missing score for "Nota geral"', line: 8 }]);
      expect(result.report.overall).toBeUndefined();
    });
  });

  describe('findings', () => {
    it('should require the columns in order', () => {
      const report = REPORT_PT.replace(
        '| Categoria | Severidade | Impacto | Evidência | Recomendação |',
        '| Severidade | Categoria | Impacto | Evidência | Recomendação |'
      );
      const result = validator.validate(report);

      expect(result.errors).toEqual([{
        field: 'findings',
        message: 'Findings table columns must be exactly: Categoria | Severidade | Impacto | Evidência | Recomendação ' +
          '(got: Severidade | Categoria | Impacto | Evidência | Recomendação)',
        line: 18
      }]);
    });

    it('should reject a findings section without a table', () => {
      const report = REPORT_PT.replace(/\| Categoria[\s\S]*?Separar o repositório \|\n/, 'Nenhum achado.\n');
      const result = validator.validate(report);

      expect(result.errors).toEqual([{
        field: 'findings',
        message: 'Findings table not found (expected columns: Categoria | Severidade | Impacto | Evidência | Recomendação)',
        line: 17
      }]);
    });

    it('should reject severities outside the scale', () => {
      const result = validator.validate(REPORT_PT.replace('| Estilo | Baixa |', '| Estilo | Urgente |'));

      expect(result.errors).toEqual([{
        field: 'findings.severity',
        message: 'Unknown severity "Urgente". Allowed: Crítica/Critical, Alta/High, Média/Medium, Baixa/Low',
        line: 20
      }]);
    });

    it('should reject rows with the wrong number of cells', () => {
      const result = validator.validate(REPORT_PT.replace('| Usar parâmetros |', '|'));

      expect(result.errors).toEqual([{ field: 'findings', message: 'Findings row has 4 cells; expected 5', line: 21 }]);
    });

    it('should warn about an empty findings table', () => {
      const report = REPORT_PT.replace(/\| Estilo \|[\s\S]*?Separar o repositório \|\n/, '');
      const result = validator.validate(report);

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual([{ field: 'findings', message: 'Findings table has no rows', line: 18 }]);
    });
  });

  describe('backlog', () => {
    it('should reject a backlog missing a horizon', () => {
      const report = REPORT_PT.replace(`#### Depois\n${BACKLOG_ITEM}\n\n`, '');
      const result = validator.validate(report);

      expect(result.errors).toEqual([{
        field: 'backlog.later',
        message: 'Backlog horizon "Depois" / "Later" is missing',
        line: 36
      }]);
      expect(result.report.horizons).toEqual(['now', 'nextCycle']);
    });

    it('should warn about items lacking fields', () => {
      const report = REPORT_PT.replace(`#### Agora\n${BACKLOG_ITEM}`, `#### Agora\n${BACKLOG_ITEM.replace('- Risco: baixo\n', '')}`);
      const result = validator.validate(report);

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual([{ field: 'backlog.now', message: 'Items under "Agora" lack: Risco', line: 38 }]);
    });
  });
});

describe('sortFindingsBySeverity', () => {
  it('should order findings from most to least severe, stable within a severity', () => {
    const finding = (category: string, severityRank: number) => ({
      category,
      severityRank,
      severityLabel: '',
      impact: '',
      evidence: '',
      recommendation: '',
      line: 1
    });
    const sorted = sortFindingsBySeverity([finding('a', 1), finding('b', 4), finding('c', 1), finding('d', 3)]);
    expect(sorted.map(f => f.category)).toEqual(['b', 'd', 'a', 'c']);
  });
});
