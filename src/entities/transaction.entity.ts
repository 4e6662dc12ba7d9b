import {
  Entity,
  Column,
  PrimaryColumn,
  CreateDateColumn,
  UpdateDateColumn,
  Index,
  ManyToMany,
} from "typeorm";
import { HeaderEntity } from "./header.entity";
import { integerTransformer } from "./columns";

@Entity("transactions")
export class TransactionEntity {
  @PrimaryColumn({ type: "varchar", length: 66 })
  hash!: string;

  @Index()
  @Column({ type: "varchar", length: 42 })
  from!: string;

  @Column({ type: "varchar", length: 42, nullable: true })
  to!: string | null;

  @Column({ type: "text" })
  data!: string;

  @Column({ type: "varchar" })
  gasPrice!: string;

  @Column({ type: "varchar" })
  gasLimit!: string;

  @Column({ type: "varchar" })
  value!: string;

  @Column({ type: "bigint", transformer: integerTransformer })
  nonce!: number;

  @Column({ type: "text", default: "" })
  error!: string;

  @ManyToMany(() => HeaderEntity, (header) => header.transactions)
  headers!: HeaderEntity[];

  @Index()
  @CreateDateColumn()
  createdAt!: Date;

  @UpdateDateColumn()
  updatedAt!: Date;
}
