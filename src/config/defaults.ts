import type { PortalMcpConfig } from './types.js';

/**
 * 預設值對應 SIGAA 學生入口的版面；其他入口以 .portalmcp.json 覆蓋
 * portal.baseUrl、selectors 與 sections / documents 目錄。
 */
export const DEFAULT_CONFIG: PortalMcpConfig = {
  version: 1,
  portal: {
    baseUrl: 'https://sigaa.ufpa.br',
    loginPath: '/sigaa/verTelaLogin.do',
    logoutPath: '/sigaa/logar.do?dispatch=logOff',
    loginUrlMarkers: ['/sigaa/verTelaLogin.do', '/sigaa/logon.jsf', '/sigaa/public/home.jsf', 'expirada'],
    homeUrlMarker: 'discente',
    login: {
      username: "input[name='user.login']",
      password: "input[name='user.senha']",
      submit: "input[type='submit'][value='Entrar']",
      error: '.msg-erro, #msgErro, .erros',
      captcha: "img[src*='captcha'], .g-recaptcha, iframe[src*='recaptcha']",
      twoFactor: "input[autocomplete='one-time-code'], input[name*='codigoVerificacao']",
      profile: {
        name: '#perfil-usuario .nome',
        registration: '#perfil-usuario .matricula',
        program: '#perfil-usuario .curso',
      },
    },
    sections: {
      grades: {
        title: 'Consultar Notas',
        path: '/sigaa/portais/discente/notas.jsf',
        aliases: ['notas'],
        extract: {
          kind: 'table',
          rowSelector: 'table.tabelaRelatorio tbody tr',
          columns: {
            course: 'td:nth-child(1)',
            finalGrade: 'td:nth-child(2)',
            status: 'td:nth-child(3)',
            period: 'td:nth-child(4)',
          },
        },
      },
      transcript: {
        title: 'Histórico Acadêmico',
        path: '/sigaa/portais/discente/historico.jsf',
        aliases: ['historico', 'history'],
        extract: {
          kind: 'table',
          rowSelector: 'table.listagem tbody tr',
          columns: {
            code: 'td:nth-child(1)',
            name: 'td:nth-child(2)',
            credits: 'td:nth-child(3)',
            grade: 'td:nth-child(4)',
            status: 'td:nth-child(5)',
            period: 'td:nth-child(6)',
          },
        },
      },
      enrollment: {
        title: 'Matrícula Online',
        path: '/sigaa/portais/discente/matricula.jsf',
        aliases: ['matricula'],
        extract: {
          kind: 'table',
          rowSelector: 'table.listagem tbody tr',
          columns: {
            code: 'td:nth-child(1)',
            course: 'td:nth-child(2)',
            schedule: 'td:nth-child(3)',
            status: 'td:nth-child(4)',
          },
        },
      },
      schedule: {
        title: 'Meu Horário de Aulas',
        path: '/sigaa/portais/discente/horario.jsf',
        aliases: ['horario'],
        extract: {
          kind: 'table',
          rowSelector: 'table#horario tbody tr',
          columns: {
            course: 'td:nth-child(1)',
            day: 'td:nth-child(2)',
            time: 'td:nth-child(3)',
            instructor: 'td:nth-child(4)',
            room: 'td:nth-child(5)',
          },
        },
      },
      notices: {
        title: 'Avisos e Notificações',
        path: '/sigaa/portais/discente/discente.jsf',
        aliases: ['avisos', 'notifications'],
        extract: {
          kind: 'list',
          itemSelector: '#avisos .aviso, .noticias li',
          fields: {
            title: '.titulo',
            date: '.data',
            body: '.descricao',
          },
        },
      },
    },
    documents: {
      historico_academico: {
        title: 'Histórico Acadêmico',
        path: '/sigaa/portais/discente/discente.jsf',
        trigger: "a:has-text('Emitir Histórico')",
        formats: ['pdf'],
      },
      comprovante_matricula: {
        title: 'Comprovante de Matrícula',
        path: '/sigaa/portais/discente/discente.jsf',
        trigger: "a:has-text('Emitir Comprovante de Matrícula')",
        semesterField: "select[name$='periodo']",
        formats: ['pdf', 'html'],
      },
      atestado_matricula: {
        title: 'Atestado de Matrícula',
        path: '/sigaa/portais/discente/discente.jsf',
        trigger: "a:has-text('Atestado de Matrícula')",
        semesterField: "select[name$='periodo']",
        formats: ['pdf'],
      },
      declaracao_vinculo: {
        title: 'Declaração de Vínculo',
        path: '/sigaa/portais/discente/discente.jsf',
        trigger: "a:has-text('Declaração de Vínculo')",
        formats: ['pdf'],
      },
    },
  },
  browser: {
    headless: true,
    navigationTimeoutMs: 30000,
    actionTimeoutMs: 10000,
    downloadTimeoutMs: 60000,
    viewport: { width: 1366, height: 900 },
  },
  dispatcher: {
    requestTimeoutMs: 180000, // 3 分鐘
    maxRetries: 2,
    baseDelayMs: 1000,
  },
  storage: {
    downloadDir: 'data/downloads',
    screenshotDir: 'data/screenshots',
    auditDbPath: 'data/.portalmcp/audit.db',
  },
  llm: {
    provider: 'none',
    baseUrl: 'https://api.openai.com/v1',
    model: 'gpt-4o-mini',
    defaultMaxSteps: 20,
    timeoutMs: 60000,
  },
  server: {
    transport: 'stdio',
    host: '127.0.0.1',
    port: 8000,
  },
  logging: {
    level: 'info',
  },
};
