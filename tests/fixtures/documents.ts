import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { BusinessApplicationHeader, Iso20022Document, MessageOf } from '../../libs/iso20022/index.js';

/**
 * Sample documents for every registered message root.
 * `creditTransfer` is the decoded form of pacs.008.001.08.xml.
 */

export function readFixture(name: string): string {
    return readFileSync(fileURLToPath(new URL(name, import.meta.url)), 'utf8');
}

const CREATED = '2026-03-01T10:15:00Z';

const debtorAgent = {
    FinInstnId: {
        ClrSysMmbId: { ClrSysId: { Cd: 'USABA' }, MmbId: '011000015' }
    }
};

const creditorAgent = {
    FinInstnId: { BICFI: 'BANKUS33XXX' }
};

export const creditTransfer: MessageOf<'FIToFICstmrCdtTrf'> = {
    GrpHdr: {
        MsgId: 'MSG-0001',
        CreDtTm: CREATED,
        BtchBookg: false,
        NbOfTxs: '2',
        TtlIntrBkSttlmAmt: { Ccy: 'USD', value: 120.5 },
        SttlmInf: { SttlmMtd: 'CLRG', ClrSys: { Cd: 'FDN' } }
    },
    CdtTrfTxInf: [
        {
            PmtId: { InstrId: 'INSTR-1', EndToEndId: 'E2E-1' },
            IntrBkSttlmAmt: { Ccy: 'USD', value: 100.5 },
            ChrgBr: 'SLEV',
            Dbtr: { Nm: 'Alice Example' },
            DbtrAcct: { Id: { Othr: { Id: '000123456' } } },
            DbtrAgt: debtorAgent,
            CdtrAgt: creditorAgent,
            Cdtr: {
                Nm: 'Bob Example',
                PstlAdr: { TwnNm: 'Springfield', Ctry: 'US', AdrLine: ['1 Main St', 'Suite 2'] }
            },
            CdtrAcct: { Id: { IBAN: 'GB00TEST00000000000001' } },
            RmtInf: { Ustrd: ['Invoice 42'] }
        },
        {
            PmtId: { EndToEndId: 'E2E-2' },
            IntrBkSttlmAmt: { Ccy: 'USD', value: 20 },
            ChrgBr: 'SLEV',
            Dbtr: { Nm: 'Alice Example' },
            DbtrAgt: debtorAgent,
            CdtrAgt: creditorAgent,
            Cdtr: { Nm: 'Carol Example' }
        }
    ]
};

export const messageReject: MessageOf<'admi.002.001.01'> = {
    RltdRef: { Ref: 'MSG-0001' },
    Rsn: {
        RjctgPtyRsn: 'SCHEMA',
        RjctnDtTm: '2026-03-01T10:16:00Z',
        ErrLctn: 'GrpHdr/MsgId',
        RsnDesc: 'Duplicate message'
    }
};

export const systemEvent: MessageOf<'SysEvtNtfctn'> = {
    EvtInf: {
        EvtCd: 'PING',
        EvtParam: ['WINDOW-1', 'WINDOW-2'],
        EvtDesc: 'Connectivity check',
        EvtTm: '2026-03-01T06:00:00Z'
    }
};

export const verificationRequest: MessageOf<'IdVrfctnReq'> = {
    Assgnmt: {
        MsgId: 'IDV-1',
        CreDtTm: CREATED,
        Assgnr: { Agt: creditorAgent },
        Assgne: { Pty: { Nm: 'Verification Service' } }
    },
    Vrfctn: [
        {
            Id: 'VRF-1',
            PtyAndAcctId: { Pty: { Nm: 'Bob Example' }, Acct: { IBAN: 'GB00TEST00000000000001' } }
        }
    ]
};

export const statement: MessageOf<'BkToCstmrStmt'> = {
    GrpHdr: { MsgId: 'STMT-1', CreDtTm: CREATED },
    Stmt: [
        {
            Id: 'STMT-1-1',
            ElctrncSeqNb: 7,
            FrToDt: { FrDtTm: '2026-02-28T00:00:00Z', ToDtTm: '2026-02-28T23:59:59Z' },
            Acct: { Id: { Othr: { Id: '000123456' } }, Ccy: 'USD' },
            Bal: [
                {
                    Tp: { CdOrPrtry: { Cd: 'CLBD' } },
                    Amt: { Ccy: 'USD', value: 1520.75 },
                    CdtDbtInd: 'CRDT',
                    Dt: { Dt: '2026-02-28' }
                }
            ],
            Ntry: [
                {
                    NtryRef: 'N1',
                    Amt: { Ccy: 'USD', value: 20 },
                    CdtDbtInd: 'DBIT',
                    RvslInd: false,
                    Sts: { Cd: 'BOOK' },
                    BookgDt: { Dt: '2026-02-28' },
                    BkTxCd: { Prtry: { Cd: 'TRF', Issr: 'BANK' } }
                }
            ]
        }
    ]
};

export const statusReport: MessageOf<'FIToFIPmtStsRpt'> = {
    GrpHdr: { MsgId: 'STS-1', CreDtTm: CREATED },
    OrgnlGrpInfAndSts: [
        { OrgnlMsgId: 'MSG-0001', OrgnlMsgNmId: 'pacs.008.001.08', GrpSts: 'PART' }
    ],
    TxInfAndSts: [
        {
            OrgnlEndToEndId: 'E2E-2',
            TxSts: 'RJCT',
            StsRsnInf: [{ Rsn: { Cd: 'AC04' }, AddtlInf: ['Account closed'] }]
        }
    ]
};

export const initiation: MessageOf<'CstmrCdtTrfInitn'> = {
    GrpHdr: {
        MsgId: 'INIT-1',
        CreDtTm: CREATED,
        NbOfTxs: '1',
        CtrlSum: 250,
        InitgPty: { Nm: 'Alice Example' }
    },
    PmtInf: [
        {
            PmtInfId: 'PMT-1',
            PmtMtd: 'TRF',
            BtchBookg: true,
            ReqdExctnDt: { Dt: '2026-03-02' },
            Dbtr: { Nm: 'Alice Example' },
            DbtrAcct: { Id: { IBAN: 'GB00TEST00000000000001' } },
            DbtrAgt: { FinInstnId: { BICFI: 'BANKGB22' } },
            CdtTrfTxInf: [
                {
                    PmtId: { EndToEndId: 'E2E-9' },
                    Amt: { InstdAmt: { Ccy: 'EUR', value: 250 } },
                    Cdtr: { Nm: 'Dave Example' },
                    RmtInf: {
                        Strd: [{ CdtrRefInf: { Tp: { CdOrPrtry: { Cd: 'SCOR' } }, Ref: 'RF18539007547034' } }]
                    }
                }
            ]
        }
    ]
};

export const remittanceAdvice: MessageOf<'RmtAdvc'> = {
    GrpHdr: { MsgId: 'RMT-1', CreDtTm: CREATED },
    RmtInf: [
        {
            RmtId: 'R-1',
            Strd: [
                {
                    RfrdDocInf: [{ Nb: 'INV-42', RltdDt: '2026-02-20' }],
                    RfrdDocAmt: { DuePyblAmt: { Ccy: 'USD', value: 100.5 } }
                }
            ],
            OrgnlPmtInf: {
                Refs: { EndToEndId: 'E2E-1' },
                Amt: { InstdAmt: { Ccy: 'USD', value: 100.5 } }
            }
        }
    ]
};

export const SAMPLE_DOCUMENTS: readonly Iso20022Document[] = [
    { tag: 'admi.002.001.01', message: messageReject },
    { tag: 'SysEvtNtfctn', message: systemEvent },
    { tag: 'IdVrfctnReq', message: verificationRequest },
    { tag: 'BkToCstmrStmt', message: statement },
    { tag: 'FIToFIPmtStsRpt', message: statusReport },
    { tag: 'FIToFICstmrCdtTrf', message: creditTransfer },
    { tag: 'CstmrCdtTrfInitn', message: initiation },
    { tag: 'RmtAdvc', message: remittanceAdvice }
];

export const header: BusinessApplicationHeader = {
    Fr: { FIId: { FinInstnId: { BICFI: 'BANKUS33XXX' } } },
    To: { FIId: { FinInstnId: { ClrSysMmbId: { MmbId: '021000021' } } } },
    BizMsgIdr: 'MSG-0001',
    MsgDefIdr: 'pacs.008.001.08',
    CreDt: CREATED,
    PssblDplct: false
};
