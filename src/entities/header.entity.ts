import {
  Entity,
  Column,
  PrimaryColumn,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
  ManyToMany,
  JoinTable,
} from "typeorm";
import config from "../config/env";
import { TransactionEntity } from "./transaction.entity";
import { binaryColumnType, integerTransformer } from "./columns";

@Entity("headers")
export class HeaderEntity {
  @PrimaryColumn({ type: "varchar", length: 66 })
  hash!: string;

  @Column({ type: "varchar", length: 66 })
  parentHash!: string;

  @Column({ type: "varchar", length: 66 })
  uncleHash!: string;

  @Column({ type: "varchar", length: 42 })
  miner!: string;

  @Column({ type: "varchar", length: 66 })
  stateRoot!: string;

  @Column({ type: "varchar", length: 66 })
  txRoot!: string;

  @Column({ type: "varchar", length: 66 })
  receiptRoot!: string;

  @Column({ type: "text" })
  logsBloom!: string;

  @Column({ type: "varchar" })
  difficulty!: string;

  @Index()
  @Column({ type: "bigint", transformer: integerTransformer })
  number!: number;

  @Column({ type: "bigint", transformer: integerTransformer })
  gasLimit!: number;

  @Column({ type: "bigint", transformer: integerTransformer })
  gasUsed!: number;

  @Index()
  @Column({ type: "bigint", transformer: integerTransformer })
  timestamp!: number;

  @Column({ type: binaryColumnType(config.database.type) })
  extraData!: Buffer;

  @Column({ type: "varchar", length: 66 })
  mixDigest!: string;

  @Column({ type: "varchar" })
  nonce!: string;

  @Column({ type: "varchar", default: "" })
  baseFee!: string;

  @Column({ type: "varchar", length: 66, default: "" })
  withdrawalsRoot!: string;

  @Column({ type: "varchar", default: "" })
  blobGasUsed!: string;

  @Column({ type: "varchar", default: "" })
  excessBlobGas!: string;

  @Column({ type: "varchar", length: 66, default: "" })
  parentBeaconBlockRoot!: string;

  @Column({ type: "varchar", length: 66, default: "" })
  requestsHash!: string;

  @Column({ type: "varchar", length: 66, default: "" })
  uncle1!: string;

  @Column({ type: "varchar", length: 66, default: "" })
  uncle2!: string;

  @Index()
  @Column({ type: "boolean", default: false })
  orphan!: boolean;

  @Column({ type: "varchar", length: 66, default: "" })
  uncleBy!: string;

  @Column({ type: "text", default: "" })
  error!: string;

  @ManyToMany(() => TransactionEntity, (transaction) => transaction.headers)
  @JoinTable({
    name: "header_transactions",
    joinColumn: { name: "headerHash", referencedColumnName: "hash" },
    inverseJoinColumn: { name: "transactionHash", referencedColumnName: "hash" },
  })
  transactions!: TransactionEntity[];

  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
